/**
 * In-process stand-ins for the browser and the HTTP client.
 *
 * FakeSite serves canned HTML by path and follows links on click, which is
 * enough to drive login, discovery and browser extraction without a
 * browser. FakeHttpClient answers GET and POST from route handlers.
 */

import { load } from 'cheerio';
import type { BrowserSession, SessionCookie } from '../../src/browser/browser_session';
import type { FormFields, HttpClient, HttpResponse, RequestOptions } from '../../src/fast/http_client';

export const TEST_HOST = 'https://cards.test';

// ============================================================================
// Browser
// ============================================================================

export interface FakePage {
  html: string;
  title?: string;
  /** Path to land on instead, the way a server redirect would */
  redirectTo?: string;
}

export const NOT_FOUND_PAGE: FakePage = {
  html: '<html><head><title>Error 404</title></head><body><h1>Not found</h1></body></html>',
};

export class FakeSite implements BrowserSession {
  /** Path and query of every page requested, in order */
  readonly visits: string[] = [];
  readonly filled = new Map<string, string>();
  readonly pressed: string[] = [];
  closed = false;

  /** Runs when a key is pressed in a form; returns the path to land on */
  onSubmit?: (fields: ReadonlyMap<string, string>) => string | null;

  private jar: SessionCookie[] = [];
  private url = `${TEST_HOST}/`;
  private page: FakePage = { html: '<html><body></body></html>' };

  constructor(private readonly pages: Record<string, FakePage> = {}) {}

  setPage(path: string, page: FakePage): void {
    this.pages[path] = page;
  }

  /** Lands on a page without the code under test asking, the way a slow redirect finishes */
  landOn(path: string): void {
    this.navigate(path);
  }

  private lookup(url: URL): FakePage {
    return this.pages[url.pathname + url.search] ?? this.pages[url.pathname] ?? NOT_FOUND_PAGE;
  }

  private navigate(target: string): void {
    let url = new URL(target, TEST_HOST);
    this.visits.push(url.pathname + url.search);
    let page = this.lookup(url);
    if (page.redirectTo) {
      url = new URL(page.redirectTo, TEST_HOST);
      page = this.lookup(url);
    }
    this.url = url.toString();
    this.page = page;
  }

  async goto(url: string): Promise<void> {
    this.navigate(url);
  }

  currentUrl(): string {
    return this.url;
  }

  async title(): Promise<string> {
    return this.page.title ?? load(this.page.html)('title').text();
  }

  async content(): Promise<string> {
    return this.page.html;
  }

  async exists(selector: string): Promise<boolean> {
    return load(this.page.html)(selector).length > 0;
  }

  async click(selector: string): Promise<boolean> {
    const element = load(this.page.html)(selector).first();
    if (element.length === 0) {
      return false;
    }
    this.follow(element.attr('href') ?? element.attr('data-href'));
    return true;
  }

  async clickText(selector: string, pattern: RegExp): Promise<boolean> {
    const $ = load(this.page.html);
    const match = $(selector)
      .toArray()
      .find((element) => pattern.test($(element).text()));
    if (!match) {
      return false;
    }
    this.follow($(match).attr('href') ?? $(match).attr('data-href'));
    return true;
  }

  async fill(selector: string, value: string): Promise<void> {
    this.filled.set(selector, value);
  }

  async press(_selector: string, key: string): Promise<void> {
    this.pressed.push(key);
    const next = this.onSubmit?.(this.filled);
    if (next) {
      this.navigate(next);
    }
  }

  async cookies(): Promise<SessionCookie[]> {
    return [...this.jar];
  }

  async addCookies(cookies: SessionCookie[]): Promise<void> {
    this.jar.push(...cookies);
  }

  async clearCookies(): Promise<void> {
    this.jar = [];
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private follow(href: string | undefined): void {
    if (href) {
      this.navigate(href);
    }
  }
}

// ============================================================================
// HTTP
// ============================================================================

export type RouteHandler = (request: { url: string; fields?: FormFields }) => HttpResponse | Promise<HttpResponse>;

export function htmlResponse(url: string, html: string, status = 200): HttpResponse {
  return { status, url, contentType: 'text/html; charset=utf-8', body: Buffer.from(html, 'utf8') };
}

export function jsonResponse(url: string, value: unknown, status = 200): HttpResponse {
  return { status, url, contentType: 'application/json', body: Buffer.from(JSON.stringify(value), 'utf8') };
}

export class FakeHttpClient implements HttpClient {
  readonly gets: string[] = [];
  readonly posts: Array<{ url: string; fields: FormFields }> = [];
  cookieLoads: SessionCookie[][] = [];

  constructor(private readonly routes: Record<string, RouteHandler> = {}) {}

  route(url: string, handler: RouteHandler): void {
    this.routes[url] = handler;
  }

  async get(url: string, _options?: RequestOptions): Promise<HttpResponse> {
    this.gets.push(url);
    const handler = this.routes[url];
    return handler ? handler({ url }) : htmlResponse(url, NOT_FOUND_PAGE.html, 404);
  }

  async postForm(url: string, fields: FormFields, _options?: RequestOptions): Promise<HttpResponse> {
    this.posts.push({ url, fields });
    const handler = this.routes[`POST ${url}`];
    return handler ? handler({ url, fields }) : htmlResponse(url, NOT_FOUND_PAGE.html, 404);
  }

  async setCookies(cookies: SessionCookie[]): Promise<void> {
    this.cookieLoads.push(cookies);
  }
}

// ============================================================================
// Card pages
// ============================================================================

export interface OptionSpec {
  id: string;
  text: string;
}

/**
 * A multiple-choice card page as the site renders it.
 */
export function mcqPage(question: string, options: OptionSpec[], extra: { multi?: boolean; patientLink?: string } = {}): string {
  const optionHtml = options
    .map((option) => `<div class="option"><input type="radio" name="guess" value="${option.id}"><label>${option.text}</label></div>`)
    .join('');
  const patient = extra.patientLink ?? '';
  return (
    `<html><head><title>Card</title></head><body>${patient}` +
    '<div id="workspace"><div class="solution container">' +
    `<form${extra.multi ? ' rel="pickmany"' : ' rel="pickone"'}>` +
    `<h3>${question}</h3><div class="options">${optionHtml}</div>` +
    '<div class="submit"><button type="submit">Submit</button></div>' +
    '</form></div></div></body></html>'
  );
}
