/**
 * Authentication Handler for the cards site
 *
 * Handles the form login and the checks around it:
 * - Form-based login with a logged-in marker check
 * - Session refresh
 * - Post-login validation of a target deck or collection URL
 */

import { load } from 'cheerio';
import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector, waitUntil } from '../browser/wait';
import { AuthError, NavigationError, errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import { hasDeckOrCollectionPath, isSameSite } from './target_url';

/**
 * Configuration for authentication
 */
export interface AuthConfig {
  /** Origin of the cards site */
  host: string;

  /** Credentials for the login form */
  credentials: {
    email: string;
    password: string;
  };

  /** CSS selectors for form elements */
  selectors?: {
    usernameField: string;
    passwordField: string;
  };

  /** Text present on every page once logged in */
  loggedInMarker?: string;

  /** Timeout for authentication operations in milliseconds */
  timeout?: number;
}

/** Default timeout for authentication operations (30 seconds) */
const DEFAULT_TIMEOUT = 30000;

const DEFAULT_SELECTORS = {
  usernameField: 'input[name="username"]',
  passwordField: 'input[name="password"]',
};

const DEFAULT_LOGGED_IN_MARKER = 'Logout';

/** URL patterns indicating a redirect to login */
const LOGIN_URL_PATTERNS = ['/login', '/signin', '/auth'];

/** Title fragments of the site's error pages */
const ERROR_TITLE_PATTERNS = ['error 403', '403 forbidden', 'error 404', '404 not found', 'not found', 'forbidden'];

/** Body fragments of the site's error pages */
const ERROR_CONTENT_PATTERNS = ['Access denied', 'Error 403', 'Error 404'];

const logger = getLogger('auth');

/**
 * Log in through the site's form.
 *
 * @throws NavigationError when the host is malformed or the login page cannot be loaded
 * @throws AuthError when the form is missing or the logged-in marker never appears
 */
export async function login(session: BrowserSession, config: AuthConfig): Promise<void> {
  const timeout = config.timeout ?? DEFAULT_TIMEOUT;
  const selectors = config.selectors ?? DEFAULT_SELECTORS;
  const marker = config.loggedInMarker ?? DEFAULT_LOGGED_IN_MARKER;

  let loginUrl: string;
  try {
    loginUrl = new URL('/login', config.host).toString();
  } catch {
    throw new NavigationError(`Invalid host: ${config.host}`, { host: config.host });
  }

  logger.info('Navigating to login page', { loginUrl });
  try {
    await session.goto(loginUrl);
  } catch (error) {
    throw new NavigationError(`Could not load login page: ${errorMessage(error)}`, { loginUrl });
  }

  const formVisible = await waitForAnySelector(session, [selectors.usernameField], { timeoutMs: timeout });
  if (!formVisible) {
    // An existing session may skip the form entirely
    if ((await session.content()).includes(marker)) {
      logger.info('Already logged in');
      return;
    }
    throw new AuthError('Login form not found on login page', { loginUrl });
  }

  await session.fill(selectors.usernameField, config.credentials.email);
  await session.fill(selectors.passwordField, config.credentials.password);
  await session.press(selectors.passwordField, 'Enter');

  const loggedIn = await waitUntil(async () => (await session.content()).includes(marker), {
    timeoutMs: timeout,
  });
  if (!loggedIn) {
    throw new AuthError('Login failed: check your email and password', { email: config.credentials.email });
  }

  logger.info('Login successful', { email: config.credentials.email });
}

/**
 * Clear cookies and log in again
 */
export async function refreshAuthentication(session: BrowserSession, config: AuthConfig): Promise<void> {
  logger.info('Refreshing authentication');
  await session.clearCookies();
  await login(session, config);
}

/**
 * Load a target URL after login and make sure it is a usable deck or
 * collection page.
 *
 * @throws NavigationError for off-site, error, blank or landing pages
 * @throws AuthError when the site bounces the request back to the login page
 */
export async function validateTarget(session: BrowserSession, config: AuthConfig, targetUrl: string): Promise<void> {
  let requested: URL;
  try {
    requested = new URL(targetUrl);
  } catch {
    throw new NavigationError(`Not a valid URL: ${targetUrl}`, { url: targetUrl });
  }
  if (!isSameSite(requested, config.host)) {
    throw new NavigationError(`URL leaves ${config.host}: ${targetUrl}`, { url: targetUrl });
  }

  try {
    await session.goto(targetUrl);
  } catch (error) {
    throw new NavigationError(`Could not load ${targetUrl}: ${errorMessage(error)}`, { url: targetUrl });
  }

  const landed = new URL(session.currentUrl());
  if (!isSameSite(landed, config.host)) {
    throw new NavigationError(`Redirected off-site to ${landed.toString()}`, { url: targetUrl });
  }
  if (LOGIN_URL_PATTERNS.some((pattern) => landed.pathname.toLowerCase().startsWith(pattern))) {
    throw new AuthError('Session is not authenticated', { url: targetUrl });
  }

  const title = (await session.title()).toLowerCase();
  const errorTitle = ERROR_TITLE_PATTERNS.find((pattern) => title.includes(pattern));
  if (errorTitle) {
    throw new NavigationError(`Target page is an error page (${errorTitle})`, { url: targetUrl });
  }

  const content = await session.content();
  const errorContent = ERROR_CONTENT_PATTERNS.find((pattern) => content.includes(pattern));
  if (errorContent) {
    throw new NavigationError(`Target page reports "${errorContent}"`, { url: targetUrl });
  }

  if (load(content)('body').text().trim() === '') {
    throw new NavigationError('Target page is blank', { url: targetUrl });
  }

  if (!hasDeckOrCollectionPath(landed.pathname)) {
    throw new NavigationError('Target resolved to a landing page, not a deck or collection', {
      url: targetUrl,
      landed: landed.toString(),
    });
  }

  logger.info('Target URL validated', { url: landed.toString() });
}

/**
 * Create an auth handler bound to one configuration
 */
export function createAuthHandler(config: AuthConfig) {
  return {
    login: (session: BrowserSession) => login(session, config),
    refresh: (session: BrowserSession) => refreshAuthentication(session, config),
    validateTarget: (session: BrowserSession, targetUrl: string) => validateTarget(session, config, targetUrl),
  };
}

export type AuthHandler = ReturnType<typeof createAuthHandler>;
