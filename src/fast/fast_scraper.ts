/**
 * Concurrent HTTP extraction.
 *
 * Card pages and solutions are fetched over HTTP with the browser's
 * cookies, many cards at a time. Cards the fast path cannot finish are
 * returned for the browser fallback rather than dropped.
 */

import type { KeywordTable } from '../content/keyword_tables';
import { errorMessage, SolutionError } from '../errors';
import type { CardContext } from '../extraction/card_builder';
import { assembleCard, type SolutionSource } from '../extraction/card_extractor';
import { cardTextLength, isFreetextPage, type ParsedCardPage } from '../extraction/card_page';
import { postSolution, type Solution, type SolutionPayload, type SolutionResult } from '../extraction/solution_client';
import { cardUrl, type Card } from '../extraction/types';
import { getLogger } from '../logging/logger';
import { responseText, type HttpClient, type HttpResponse } from './http_client';
import { mapWithConcurrency } from './semaphore';
import type { SessionMonitor } from './session_monitor';

const logger = getLogger('fast');

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CONCURRENCY = 10;
export const DEFAULT_MAX_SOLUTION_ATTEMPTS = 3;
export const DEFAULT_MIN_CONTENT_CHARS = 50;

export interface CardRequest {
  cardId: string;
  context: CardContext;
}

export type FallbackReason = 'auth' | 'http' | 'thin-content' | 'empty' | 'solution' | 'error';

export type FastOutcome =
  | { kind: 'card'; card: Card }
  | { kind: 'fallback'; request: CardRequest; reason: FallbackReason };

export interface FastScrapeResult {
  /** Finished cards keyed by id; completion order is not preserved */
  cards: Map<string, Card>;
  /** Cards to retry in the browser */
  fallback: CardRequest[];
}

export interface FastScraperOptions {
  host: string;
  concurrency?: number;
  maxSolutionAttempts?: number;
  /** Card pages with less visible text than this go to the fallback */
  minContentChars?: number;
  keywords?: KeywordTable;
}

// ============================================================================
// Scraper
// ============================================================================

function isLoggedOutResponse(response: HttpResponse): boolean {
  return response.status === 401 || response.status === 403 || /\/login\b/.test(response.url);
}

export class FastScraper {
  private readonly concurrency: number;
  private readonly maxAttempts: number;
  private readonly minContentChars: number;

  constructor(
    private readonly http: HttpClient,
    private readonly monitor: SessionMonitor,
    private readonly options: FastScraperOptions
  ) {
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.maxAttempts = options.maxSolutionAttempts ?? DEFAULT_MAX_SOLUTION_ATTEMPTS;
    this.minContentChars = options.minContentChars ?? DEFAULT_MIN_CONTENT_CHARS;
  }

  async scrape(requests: readonly CardRequest[]): Promise<FastScrapeResult> {
    const started = Date.now();
    const settled = await mapWithConcurrency(requests, this.concurrency, (request) => this.scrapeCard(request));

    const cards = new Map<string, Card>();
    const fallback: CardRequest[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        logger.error('Unexpected fast path rejection', { error: errorMessage(result.reason) });
      } else if (result.value.kind === 'card') {
        cards.set(result.value.card.id, result.value.card);
      } else {
        fallback.push(result.value.request);
      }
    }

    // A rejection carries no request: whatever is neither finished nor queued goes to the fallback
    const queued = new Set(fallback.map((request) => request.cardId));
    for (const request of requests) {
      if (!cards.has(request.cardId) && !queued.has(request.cardId)) {
        fallback.push(request);
      }
    }

    logger.info('Fast path finished', {
      requested: requests.length,
      extracted: cards.size,
      fallback: fallback.length,
      refreshes: this.monitor.refreshCount,
      durationMs: Date.now() - started,
    });
    return { cards, fallback };
  }

  async scrapeCard(request: CardRequest): Promise<FastOutcome> {
    const { cardId } = request;
    try {
      const response = await this.fetchCardPage(cardId);
      if (response === null) {
        return this.toFallback(request, 'auth');
      }
      if (response.status !== 200) {
        logger.warn('Card page request failed', { cardId, status: response.status });
        return this.toFallback(request, 'http');
      }

      const html = responseText(response);
      if (cardTextLength(html) < this.minContentChars) {
        return this.toFallback(request, 'thin-content');
      }

      const outcome = await assembleCard(html, cardId, request.context, {
        http: this.http,
        host: this.options.host,
        solve: this.solutionSource(),
        keywords: this.options.keywords,
      });
      if (outcome.kind !== 'card') {
        return this.toFallback(request, 'empty');
      }

      logger.debug('Card extracted', { cardId });
      return outcome;
    } catch (error) {
      if (error instanceof SolutionError) {
        return this.toFallback(request, 'solution');
      }
      logger.warn('Fast extraction failed', { cardId, error: errorMessage(error) });
      return this.toFallback(request, 'error');
    }
  }

  /**
   * Card page GET, retried while the responses look logged out.
   *
   * @returns null when every attempt came back logged out
   */
  private async fetchCardPage(cardId: string): Promise<HttpResponse | null> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const generation = await this.monitor.ensureFresh();
      const response = await this.http.get(cardUrl(this.options.host, cardId));
      if (!isLoggedOutResponse(response)) {
        this.monitor.recordSuccess(generation);
        return response;
      }
      await this.monitor.reportAuthFailure(generation);
    }
    return null;
  }

  /**
   * Solution fetch with retries. Attempts alternate the empty guess and the
   * all-options guess; auth-looking responses are reported to the monitor,
   * which refreshes the session between attempts once they pile up.
   */
  solutionSource(): SolutionSource {
    return (page) => this.solve(page);
  }

  private async solve(page: ParsedCardPage): Promise<Solution> {
    const payloads: SolutionPayload[] = isFreetextPage(page) ? ['freetext'] : ['empty', 'all-options'];

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const payload = payloads[attempt % payloads.length];
      const generation = await this.monitor.ensureFresh();

      let result: SolutionResult;
      try {
        result = await postSolution(this.http, this.options.host, page.cardId, payload, page.options);
      } catch (error) {
        logger.debug('Solution request failed', { cardId: page.cardId, payload, attempt, error: errorMessage(error) });
        continue;
      }

      switch (result.kind) {
        case 'solution':
          this.monitor.recordSuccess(generation);
          return result.solution;
        case 'auth':
          await this.monitor.reportAuthFailure(generation);
          break;
        case 'invalid':
          logger.debug('Invalid solution response', { cardId: page.cardId, payload, reason: result.reason });
          break;
      }
    }

    throw new SolutionError(`Solution attempts exhausted for card ${page.cardId}`, {
      cardId: page.cardId,
      attempts: this.maxAttempts,
    });
  }

  private toFallback(request: CardRequest, reason: FallbackReason): FastOutcome {
    logger.info('Routing card to browser fallback', { cardId: request.cardId, reason });
    return { kind: 'fallback', request, reason };
  }
}
