/**
 * Browser session abstraction.
 *
 * Discovery, login and the slow extraction path drive the site through this
 * interface only. Page contents are read back as HTML and parsed outside the
 * browser, so the same parsing code serves the browser and HTTP paths.
 */

/**
 * A cookie as exchanged between the browser and the HTTP client.
 */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix time in seconds; -1 for a session cookie */
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
}

export interface BrowserSession {
  /** Navigate and wait for the DOM to be ready */
  goto(url: string): Promise<void>;

  /** URL of the current page after any redirects */
  currentUrl(): string;

  title(): Promise<string>;

  /** Serialized HTML of the current page */
  content(): Promise<string>;

  /** Whether at least one element matches the selector */
  exists(selector: string): Promise<boolean>;

  /**
   * Click the first visible element matching the selector.
   * Resolves false when nothing clickable matched.
   */
  click(selector: string): Promise<boolean>;

  /**
   * Click the first visible element matching the selector whose text
   * matches the pattern. Resolves false when nothing matched.
   */
  clickText(selector: string, pattern: RegExp): Promise<boolean>;

  fill(selector: string, value: string): Promise<void>;

  press(selector: string, key: string): Promise<void>;

  cookies(): Promise<SessionCookie[]>;

  addCookies(cookies: SessionCookie[]): Promise<void>;

  clearCookies(): Promise<void>;

  close(): Promise<void>;
}
