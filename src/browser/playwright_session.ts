/**
 * Playwright-backed BrowserSession.
 */

import { chromium, type Browser, type BrowserContext, type Cookie, type Page } from 'playwright';
import type { BrowserSession, SessionCookie } from './browser_session';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';

const logger = getLogger('browser');

export interface PlaywrightSessionOptions {
  headless: boolean;
  navigationTimeoutMs: number;
}

/** Cookie shape accepted by BrowserContext.addCookies */
export function toPlaywrightCookie(cookie: SessionCookie): Cookie {
  return {
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires ?? -1,
    httpOnly: cookie.httpOnly ?? false,
    secure: cookie.secure ?? false,
    sameSite: 'Lax',
  };
}

export class PlaywrightSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly options: PlaywrightSessionOptions
  ) {}

  static async launch(options: PlaywrightSessionOptions): Promise<PlaywrightSession> {
    logger.info('Launching browser', { headless: options.headless });
    const browser = await chromium.launch({
      headless: options.headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
    });
    const context = await browser.newContext();
    const page = await context.newPage();
    page.setDefaultTimeout(options.navigationTimeoutMs);
    return new PlaywrightSession(browser, context, page, options);
  }

  async goto(url: string): Promise<void> {
    logger.debug('Navigating', { url });
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.options.navigationTimeoutMs,
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  title(): Promise<string> {
    return this.page.title();
  }

  content(): Promise<string> {
    return this.page.content();
  }

  async exists(selector: string): Promise<boolean> {
    return (await this.page.locator(selector).count()) > 0;
  }

  async click(selector: string): Promise<boolean> {
    const locator = this.page.locator(selector);
    const count = await locator.count();
    for (let i = 0; i < count; i++) {
      const candidate = locator.nth(i);
      if ((await candidate.isVisible()) && (await candidate.isEnabled())) {
        await candidate.click();
        await this.settle();
        return true;
      }
    }
    return false;
  }

  async clickText(selector: string, pattern: RegExp): Promise<boolean> {
    const locator = this.page.locator(selector).filter({ hasText: pattern });
    const count = await locator.count();
    for (let i = 0; i < count; i++) {
      const candidate = locator.nth(i);
      if (await candidate.isVisible()) {
        await candidate.click();
        await this.settle();
        return true;
      }
    }
    return false;
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.page.fill(selector, value);
  }

  async press(selector: string, key: string): Promise<void> {
    await this.page.press(selector, key);
    await this.settle();
  }

  async cookies(): Promise<SessionCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
    }));
  }

  async addCookies(cookies: SessionCookie[]): Promise<void> {
    await this.context.addCookies(cookies.map(toPlaywrightCookie));
  }

  async clearCookies(): Promise<void> {
    await this.context.clearCookies();
  }

  async close(): Promise<void> {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }

  /**
   * Clicks may or may not trigger a navigation; wait briefly for one to
   * finish loading without failing when none happened.
   */
  private async settle(): Promise<void> {
    try {
      await this.page.waitForLoadState('domcontentloaded', { timeout: this.options.navigationTimeoutMs });
    } catch (error) {
      logger.debug('Page did not settle after interaction', { url: this.page.url(), error: errorMessage(error) });
    }
  }
}
