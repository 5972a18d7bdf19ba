/**
 * Credentials lifecycle around the browser login.
 *
 * Saved credentials are cleared as soon as the site rejects them, and the
 * user is asked again. Typed credentials are written to the file only after
 * the target URL has been validated with them; credentials from the
 * environment never are. A navigation error leaves the file alone, and a
 * prompted target may be asked for again on the logged-in session.
 */

import { createAuthHandler, type AuthHandler } from '../auth/auth_handler';
import type { BrowserSession } from '../browser/browser_session';
import type { Credentials, CredentialsStore } from '../config/credentials_store';
import { AuthError, NavigationError } from '../errors';
import { getLogger } from '../logging/logger';
import { promptCredentials, type Prompter } from './prompts';

const logger = getLogger('login');

const DEFAULT_MAX_ATTEMPTS = 3;

const DEFAULT_MAX_RETARGETS = 3;

export interface LoginFlowOptions {
  host: string;
  /** Deck or collection page to validate once logged in */
  targetUrl: string;
  store: CredentialsStore;
  prompter: Prompter;
  /** Credentials from the environment or the saved file; prompted for when null */
  initial: Pick<Credentials, 'email' | 'password'> | null;
  timeoutMs?: number;
  maxAttempts?: number;
  /** Asks for another target URL when the current one is unusable */
  retarget?: (error: NavigationError) => Promise<string>;
  maxRetargets?: number;
}

export interface EstablishedSession {
  auth: AuthHandler;
  /** The target URL that validated */
  targetUrl: string;
}

/**
 * Validate the target, asking for another one while `retarget` allows.
 */
async function validateOrRetarget(
  session: BrowserSession,
  auth: AuthHandler,
  targetUrl: string,
  options: LoginFlowOptions
): Promise<string> {
  const maxRetargets = options.maxRetargets ?? DEFAULT_MAX_RETARGETS;
  let current = targetUrl;

  for (let retargets = 0; ; retargets++) {
    try {
      await auth.validateTarget(session, current);
      return current;
    } catch (error) {
      if (!(error instanceof NavigationError) || !options.retarget || retargets >= maxRetargets) {
        throw error;
      }
      logger.warn('Target rejected', { url: current, error: error.message });
      current = await options.retarget(error);
    }
  }
}

/**
 * Log in and validate the target.
 *
 * @throws AuthError when every attempt is rejected
 * @throws NavigationError when the target URL is unusable
 */
export async function establishSession(session: BrowserSession, options: LoginFlowOptions): Promise<EstablishedSession> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  let prompted = options.initial === null;
  let credentials = options.initial ?? (await promptCredentials(options.prompter));
  let targetUrl = options.targetUrl;

  for (let attempt = 1; ; attempt++) {
    const auth = createAuthHandler({ host: options.host, credentials, timeout: options.timeoutMs });
    try {
      await auth.login(session);
      targetUrl = await validateOrRetarget(session, auth, targetUrl, options);
    } catch (error) {
      if (!(error instanceof AuthError)) {
        throw error;
      }
      logger.warn('Credentials rejected', { email: credentials.email, attempt, error: error.message });
      await options.store.clear();
      if (attempt >= maxAttempts) {
        throw error;
      }
      await session.clearCookies();
      credentials = await promptCredentials(options.prompter);
      prompted = true;
      continue;
    }

    if (prompted) {
      await options.store.save({ ...credentials, baseHost: options.host });
    }
    return { auth, targetUrl };
  }
}

/**
 * Credentials to try first: the environment, then the saved file when it was
 * written for this host.
 */
export function initialCredentials(
  env: { email?: string; password?: string },
  saved: Credentials | null,
  host: string
): Pick<Credentials, 'email' | 'password'> | null {
  if (env.email && env.password) {
    return { email: env.email, password: env.password };
  }
  if (saved && (saved.baseHost === undefined || saved.baseHost === host)) {
    return { email: saved.email, password: saved.password };
  }
  return null;
}
