/**
 * Cookie-carrying HTTP client for the fast path.
 *
 * Cookies copied out of the logged-in browser session are kept in a
 * tough-cookie jar and sent with every request; Set-Cookie headers on the
 * responses are stored back into the jar. The number of requests in flight
 * is bounded to emulate a fixed-size connection pool.
 */

import { Cookie, CookieJar } from 'tough-cookie';
import type { SessionCookie } from '../browser/browser_session';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import { Semaphore } from './semaphore';

const logger = getLogger('http');

/** Ordered form fields; keys may repeat (`guess[]`). */
export type FormFields = Array<[string, string]>;

export interface HttpResponse {
  status: number;
  /** Final URL after redirects */
  url: string;
  contentType: string;
  body: Buffer;
}

export interface RequestOptions {
  timeoutMs?: number;
  /** Accept header; defaults to HTML */
  accept?: string;
}

export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
  postForm(url: string, fields: FormFields, options?: RequestOptions): Promise<HttpResponse>;
  /** Replace the jar's contents with cookies from the browser */
  setCookies(cookies: SessionCookie[]): Promise<void>;
}

export interface FetchHttpClientOptions {
  /** Upper bound on concurrent requests */
  maxConnections: number;
  /** Default per-request timeout */
  timeoutMs: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36';

export function responseText(response: HttpResponse): string {
  return response.body.toString('utf8');
}

export class FetchHttpClient implements HttpClient {
  private cookieJar = new CookieJar();
  private readonly connections: Semaphore;

  constructor(private readonly options: FetchHttpClientOptions) {
    this.connections = new Semaphore(options.maxConnections);
  }

  get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.request(url, { method: 'GET' }, options);
  }

  postForm(url: string, fields: FormFields, options: RequestOptions = {}): Promise<HttpResponse> {
    const body = new URLSearchParams();
    for (const [key, value] of fields) {
      body.append(key, value);
    }
    return this.request(
      url,
      {
        method: 'POST',
        body: body.toString(),
        headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8', 'X-Requested-With': 'XMLHttpRequest' },
      },
      { accept: 'application/json, text/javascript, */*; q=0.01', ...options }
    );
  }

  async setCookies(cookies: SessionCookie[]): Promise<void> {
    this.cookieJar = new CookieJar();
    for (const cookie of cookies) {
      const domain = cookie.domain.replace(/^\./, '');
      const url = `${cookie.secure ? 'https' : 'http'}://${domain}${cookie.path || '/'}`;
      const toughCookie = new Cookie({
        key: cookie.name,
        value: cookie.value,
        domain,
        path: cookie.path || '/',
        secure: cookie.secure ?? false,
        httpOnly: cookie.httpOnly ?? false,
      });
      try {
        await this.cookieJar.setCookie(toughCookie, url);
      } catch (error) {
        logger.warn('Skipping cookie the jar rejected', { name: cookie.name, domain, error: errorMessage(error) });
      }
    }
    logger.debug('Cookie jar loaded', { count: cookies.length });
  }

  private async request(
    url: string,
    init: { method: string; body?: string; headers?: Record<string, string> },
    options: RequestOptions
  ): Promise<HttpResponse> {
    return this.connections.use(async () => {
      const headers: Record<string, string> = {
        'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: options.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        ...init.headers,
      };
      const cookieString = await this.cookieJar.getCookieString(url);
      if (cookieString) {
        headers['Cookie'] = cookieString;
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs ?? this.options.timeoutMs);

      try {
        const response = await fetch(url, {
          method: init.method,
          body: init.body,
          headers,
          signal: controller.signal,
          redirect: 'follow',
        });

        for (const setCookie of response.headers.getSetCookie()) {
          try {
            await this.cookieJar.setCookie(setCookie, response.url || url);
          } catch (error) {
            logger.debug('Ignoring invalid Set-Cookie header', { url, error: errorMessage(error) });
          }
        }

        return {
          status: response.status,
          url: response.url || url,
          contentType: response.headers.get('content-type') ?? '',
          body: Buffer.from(await response.arrayBuffer()),
        };
      } finally {
        clearTimeout(timeoutId);
      }
    });
  }
}
