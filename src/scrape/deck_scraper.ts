/**
 * Deck scraping: discovery, then extraction over the fast path or the
 * browser, then patient backfill.
 */

import type { AuthHandler } from '../auth/auth_handler';
import type { BrowserSession } from '../browser/browser_session';
import type { KeywordTable } from '../content/keyword_tables';
import { discoverDeck, type DiscoveryMethod, type DiscoveryStrategy } from '../discovery';
import type { CardContext } from '../extraction/card_builder';
import { BrowserCardExtractor } from '../extraction/card_extractor';
import { backfillPatients } from '../extraction/patient_assignment';
import type { Card, DeckRef } from '../extraction/types';
import type { BrowserFallback } from '../fast/browser_fallback';
import { FastScraper, type CardRequest } from '../fast/fast_scraper';
import type { HttpClient } from '../fast/http_client';
import { SessionMonitor, type SessionMonitorOptions } from '../fast/session_monitor';
import { getLogger } from '../logging/logger';

const logger = getLogger('deck-scraper');

// ============================================================================
// Types
// ============================================================================

export interface ScrapeDependencies {
  session: BrowserSession;
  http: HttpClient;
  auth: AuthHandler;
  host: string;
  /** Use concurrent HTTP extraction; the browser extracts one card at a time otherwise */
  fastPath: boolean;
  fallback: BrowserFallback;
  concurrency?: number;
  waitTimeoutMs?: number;
  keywords?: KeywordTable;
  /** Discovery strategies, in the order they are tried */
  strategies?: DiscoveryStrategy[];
  monitor?: SessionMonitorOptions;
}

export interface DeckScrapeResult {
  deck: DeckRef;
  method: DiscoveryMethod;
  /** In discovery order */
  cards: Card[];
  /** Patient names from the details page */
  patients: string[];
}

// ============================================================================
// Scraping
// ============================================================================

function cardRequests(deck: DeckRef, cardIds: string[], patients: string[], isSequential: boolean): CardRequest[] {
  const paired = !isSequential && patients.length === cardIds.length;
  return cardIds.map((cardId, index) => {
    const context: CardContext = { deckTitle: deck.title, isSequential };
    if (paired) {
      context.patientInfo = patients[index];
    }
    return { cardId, context };
  });
}

async function copyCookies(deps: ScrapeDependencies): Promise<void> {
  await deps.http.setCookies(await deps.session.cookies());
}

async function extractFast(deps: ScrapeDependencies, requests: CardRequest[]): Promise<Map<string, Card>> {
  const monitor = new SessionMonitor(async () => {
    await deps.auth.refresh(deps.session);
    await copyCookies(deps);
  }, deps.monitor);

  const scraper = new FastScraper(deps.http, monitor, {
    host: deps.host,
    concurrency: deps.concurrency,
    keywords: deps.keywords,
  });
  const { cards, fallback } = await scraper.scrape(requests);

  if (fallback.length > 0) {
    const recovered = await deps.fallback(fallback, await deps.session.cookies(), deps.http);
    for (const [cardId, card] of recovered) {
      cards.set(cardId, card);
    }
  }
  return cards;
}

async function extractInBrowser(deps: ScrapeDependencies, requests: CardRequest[]): Promise<Map<string, Card>> {
  const extractor = new BrowserCardExtractor(deps.session, deps.http, {
    host: deps.host,
    readyTimeoutMs: deps.waitTimeoutMs,
    keywords: deps.keywords,
  });
  const contexts = new Map(requests.map((request) => [request.cardId, request.context]));
  const outcomes = await extractor.extractAll(
    requests.map((request) => request.cardId),
    (cardId) => contexts.get(cardId) ?? { deckTitle: '', isSequential: false }
  );

  const cards = new Map<string, Card>();
  const empty: CardRequest[] = [];
  for (const outcome of outcomes) {
    if (outcome.kind === 'card') {
      cards.set(outcome.card.id, outcome.card);
    } else if (outcome.kind === 'empty') {
      const context = contexts.get(outcome.cardId);
      if (context) {
        empty.push({ cardId: outcome.cardId, context });
      }
    }
  }

  if (empty.length > 0) {
    const recovered = await deps.fallback(empty, await deps.session.cookies(), deps.http);
    for (const [cardId, card] of recovered) {
      cards.set(cardId, card);
    }
  }
  return cards;
}

/**
 * Discover and extract every card of one deck.
 *
 * @throws DiscoveryError when no strategy finds cards
 */
export async function scrapeDeck(
  deps: ScrapeDependencies,
  deck: DeckRef,
  options: { limit?: number } = {}
): Promise<DeckScrapeResult> {
  logger.info('Scraping deck', { deckId: deck.deckId, bagId: deck.bagId, title: deck.title });

  const { details, result } = await discoverDeck(deps.session, deck, {
    limit: options.limit,
    waitTimeoutMs: deps.waitTimeoutMs,
    strategies: deps.strategies,
  });

  const requests = cardRequests(deck, result.cardIds, result.patients, result.isSequential);
  await copyCookies(deps);

  const extracted = deps.fastPath ? await extractFast(deps, requests) : await extractInBrowser(deps, requests);

  const cards = backfillPatients(result.cardIds, extracted, details.patients);

  logger.info('Deck scraped', {
    deckId: deck.deckId,
    method: result.method,
    discovered: result.cardIds.length,
    extracted: cards.length,
  });
  return { deck, method: result.method, cards, patients: details.patients };
}
