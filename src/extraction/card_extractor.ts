/**
 * Card extraction.
 *
 * `assembleCard` turns a card page's HTML into a Card: it parses the page,
 * builds the background, asks the solution endpoint for the answer and
 * embeds the page's images. The browser extractor and the HTTP fast path
 * both feed it HTML and differ only in how they fetch pages and solutions.
 */

import { buildBackground } from '../content/background_extractor';
import { embedImagesInHtml, extractPageImages } from '../content/image_embedder';
import { getKeywordTable, type KeywordTable } from '../content/keyword_tables';
import { cleanPortraits } from '../content/portrait_filter';
import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector } from '../browser/wait';
import { errorMessage, ExtractionError, SolutionError } from '../errors';
import type { HttpClient } from '../fast/http_client';
import { getLogger } from '../logging/logger';
import { buildCard, isEmptyCardPage, type CardContext } from './card_builder';
import { CARD_READY_SELECTORS, isFreetextPage, parseCardPage, type ParsedCardPage } from './card_page';
import { EMPTY_SOLUTION, fetchSolution, type Solution } from './solution_client';
import { cardUrl, type Card } from './types';

const logger = getLogger('card-extractor');

// ============================================================================
// Types
// ============================================================================

/** Fetches the solution for a parsed page */
export type SolutionSource = (page: ParsedCardPage) => Promise<Solution>;

export type CardOutcome =
  | { kind: 'card'; card: Card }
  /** Page rendered with no question and no background */
  | { kind: 'empty'; cardId: string }
  | { kind: 'failed'; cardId: string; error: ExtractionError };

export interface AssembleOptions {
  http: HttpClient;
  host: string;
  /** Defaults to the solution endpoint with the browser path's payload order */
  solve?: SolutionSource;
  keywords?: KeywordTable;
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Solutions straight from the endpoint. When every payload fails the card
 * keeps its question and falls back to the first option as its answer.
 */
export function defaultSolutionSource(http: HttpClient, host: string): SolutionSource {
  return async (page) => {
    try {
      return await fetchSolution(http, host, page.cardId, page.options, isFreetextPage(page));
    } catch (error) {
      if (!(error instanceof SolutionError)) {
        throw error;
      }
      logger.warn('Solution unavailable; using first option', { cardId: page.cardId, error: error.message });
      return EMPTY_SOLUTION;
    }
  };
}

/**
 * Build a card from the HTML of its page.
 *
 * @throws whatever the solution source throws
 */
export async function assembleCard(
  html: string,
  cardId: string,
  context: CardContext,
  options: AssembleOptions
): Promise<CardOutcome> {
  const table = options.keywords ?? getKeywordTable();
  const page = parseCardPage(html, cardId);
  const background = cleanPortraits(buildBackground(html, table), table);

  if (isEmptyCardPage(page, background)) {
    return { kind: 'empty', cardId };
  }

  const solve = options.solve ?? defaultSolutionSource(options.http, options.host);
  const solution = await solve(page);
  const feedback = await embedImagesInHtml(cleanPortraits(solution.feedback, table), options.http, options.host);
  const images = await extractPageImages(html, options.http, options.host);

  return {
    kind: 'card',
    card: buildCard({ page, background, images, solution: { ...solution, feedback } }, context),
  };
}

// ============================================================================
// Browser extraction
// ============================================================================

export interface BrowserCardExtractorOptions {
  host: string;
  /** How long to wait for a card page to render */
  readyTimeoutMs?: number;
  keywords?: KeywordTable;
}

/**
 * Extracts cards one at a time by loading each card page in the browser.
 */
export class BrowserCardExtractor {
  constructor(
    private readonly session: BrowserSession,
    private readonly http: HttpClient,
    private readonly options: BrowserCardExtractorOptions
  ) {}

  private async open(cardId: string): Promise<void> {
    const url = cardUrl(this.options.host, cardId);
    try {
      await this.session.goto(url);
    } catch (error) {
      throw new ExtractionError(`Could not load card ${cardId}: ${errorMessage(error)}`, { cardId, url });
    }
  }

  async extract(cardId: string, context: CardContext): Promise<CardOutcome> {
    try {
      await this.open(cardId);
      const ready = await waitForAnySelector(this.session, CARD_READY_SELECTORS, {
        timeoutMs: this.options.readyTimeoutMs,
      });
      if (!ready) {
        logger.warn('Card page did not render its form', { cardId });
      }

      const html = await this.session.content();
      return await assembleCard(html, cardId, context, {
        http: this.http,
        host: this.options.host,
        keywords: this.options.keywords,
      });
    } catch (error) {
      const failure =
        error instanceof ExtractionError
          ? error
          : new ExtractionError(`Card ${cardId} failed: ${errorMessage(error)}`, { cardId });
      logger.error('Card extraction failed', { cardId, code: failure.code, error: failure.message });
      return { kind: 'failed', cardId, error: failure };
    }
  }

  /**
   * Extract cards in order. `contextFor` supplies each card's context.
   */
  async extractAll(cardIds: readonly string[], contextFor: (cardId: string, index: number) => CardContext): Promise<CardOutcome[]> {
    const outcomes: CardOutcome[] = [];
    for (const [index, cardId] of cardIds.entries()) {
      const outcome = await this.extract(cardId, contextFor(cardId, index));
      if (outcome.kind === 'card') {
        logger.info('Extracted card', { cardId, position: index + 1, total: cardIds.length });
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }
}
