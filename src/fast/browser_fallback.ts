/**
 * Browser fallback for cards the fast path could not finish.
 *
 * One crawlee PlaywrightCrawler batch renders every leftover card page with
 * the session cookies injected before navigation, then hands the rendered
 * HTML to the same assembly code the fast path uses.
 */

import {
  PlaywrightCrawler,
  createPlaywrightRouter,
  Configuration,
  LogLevel,
  type PlaywrightCrawlingContext,
} from 'crawlee';
import { v4 as uuidv4 } from 'uuid';
import type { SessionCookie } from '../browser/browser_session';
import { toPlaywrightCookie } from '../browser/playwright_session';
import type { KeywordTable } from '../content/keyword_tables';
import { errorMessage } from '../errors';
import { assembleCard } from '../extraction/card_extractor';
import { CARD_READY_SELECTORS } from '../extraction/card_page';
import { cardUrl, type Card } from '../extraction/types';
import { getLogger } from '../logging/logger';
import type { CardRequest } from './fast_scraper';
import type { HttpClient } from './http_client';

const logger = getLogger('browser-fallback');

// ============================================================================
// Types
// ============================================================================

export interface BrowserFallbackOptions {
  host: string;
  headless: boolean;
  navigationTimeoutMs: number;
  /** Pages rendered at once */
  maxConcurrency?: number;
  keywords?: KeywordTable;
}

/** Runs the fallback for a batch of cards */
export type BrowserFallback = (
  requests: readonly CardRequest[],
  cookies: SessionCookie[],
  http: HttpClient
) => Promise<Map<string, Card>>;

const DEFAULT_FALLBACK_CONCURRENCY = 3;

// ============================================================================
// Crawl
// ============================================================================

export function createBrowserFallback(options: BrowserFallbackOptions): BrowserFallback {
  return (requests, cookies, http) => runBrowserFallback(requests, cookies, http, options);
}

export async function runBrowserFallback(
  requests: readonly CardRequest[],
  cookies: SessionCookie[],
  http: HttpClient,
  options: BrowserFallbackOptions
): Promise<Map<string, Card>> {
  const cards = new Map<string, Card>();
  if (requests.length === 0) {
    return cards;
  }

  logger.info('Starting browser fallback', { count: requests.length });
  Configuration.getGlobalConfig().set('logLevel', LogLevel.WARNING);

  const contexts = new Map(requests.map((request) => [request.cardId, request.context]));
  const runId = uuidv4();
  const navigationTimeoutSecs = Math.ceil(options.navigationTimeoutMs / 1000);

  const router = createPlaywrightRouter();

  router.addDefaultHandler(async ({ page, request }: PlaywrightCrawlingContext) => {
    const cardId: unknown = request.userData.cardId;
    const context = typeof cardId === 'string' ? contexts.get(cardId) : undefined;
    if (typeof cardId !== 'string' || !context) {
      logger.warn('Fallback request without a card id', { url: request.url });
      return;
    }

    await page.waitForSelector(CARD_READY_SELECTORS.join(', '), { timeout: options.navigationTimeoutMs }).catch((error: unknown) => {
      logger.debug('Card form did not appear', { cardId, error: errorMessage(error) });
    });

    const outcome = await assembleCard(await page.content(), cardId, context, {
      http,
      host: options.host,
      keywords: options.keywords,
    });

    if (outcome.kind === 'card') {
      cards.set(cardId, outcome.card);
      logger.info('Fallback extracted card', { cardId });
    } else {
      logger.warn('Fallback page had no card content', { cardId });
    }
  });

  const crawler = new PlaywrightCrawler(
    {
      requestHandler: router,
      maxConcurrency: options.maxConcurrency ?? DEFAULT_FALLBACK_CONCURRENCY,
      navigationTimeoutSecs,
      requestHandlerTimeoutSecs: navigationTimeoutSecs * 2,
      useSessionPool: false,
      persistCookiesPerSession: false,
      maxRequestRetries: 1,
      launchContext: {
        launchOptions: {
          headless: options.headless,
        },
      },
      browserPoolOptions: {
        useFingerprints: false,
      },
      preNavigationHooks: [
        async ({ page }) => {
          await page.context().addCookies(cookies.map(toPlaywrightCookie));
        },
      ],
      failedRequestHandler: async ({ request }, error) => {
        logger.error('Fallback failed for card', { url: request.url, error: errorMessage(error) });
      },
    },
    new Configuration({ persistStorage: false })
  );

  try {
    await crawler.run(
      requests.map((request) => ({
        url: cardUrl(options.host, request.cardId),
        uniqueKey: `${runId}:${request.cardId}`,
        userData: { cardId: request.cardId },
      }))
    );
  } catch (error) {
    logger.error('Browser fallback run failed', { error: errorMessage(error) });
  }

  logger.info('Browser fallback finished', { requested: requests.length, extracted: cards.size });
  return cards;
}
