import { readCollection } from '../discovery';
import { AuthError, DiscoveryError, errorMessage } from '../errors';
import type { DeckInfo } from '../extraction/types';
import { getLogger } from '../logging/logger';
import { scrapeDeck, type DeckScrapeResult, type ScrapeDependencies } from './deck_scraper';

const logger = getLogger('collection-scraper');

export interface CollectionScrapeResult {
  collectionId: string;
  title: string;
  decks: DeckInfo[];
  /** Decks that yielded at least one card, in collection order */
  results: DeckScrapeResult[];
  /** Deck ids that failed discovery or extraction */
  failed: string[];
}

/**
 * Scrape every deck of a collection, one deck at a time. A deck that fails
 * is logged and skipped; an AuthError ends the run.
 *
 * @param options.limit maximum number of decks
 */
export async function scrapeCollection(
  deps: ScrapeDependencies,
  collectionId: string,
  options: { limit?: number } = {}
): Promise<CollectionScrapeResult> {
  const listing = await readCollection(deps.session, deps.host, collectionId, { timeoutMs: deps.waitTimeoutMs });
  const decks = options.limit !== undefined && options.limit > 0 ? listing.decks.slice(0, options.limit) : listing.decks;

  const results: DeckScrapeResult[] = [];
  const failed: string[] = [];

  for (const [index, deck] of decks.entries()) {
    logger.info('Collection deck', { collectionId, deckId: deck.deckId, position: index + 1, total: decks.length });
    try {
      const result = await scrapeDeck(deps, {
        host: deps.host,
        deckId: deck.deckId,
        bagId: deck.bagId,
        title: deck.title,
      });
      if (result.cards.length > 0) {
        results.push(result);
      } else {
        failed.push(deck.deckId);
      }
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      if (error instanceof DiscoveryError) {
        logger.warn('No cards found for deck; skipping', { deckId: deck.deckId, title: deck.title });
      } else {
        logger.error('Deck scrape failed; skipping', { deckId: deck.deckId, error: errorMessage(error) });
      }
      failed.push(deck.deckId);
    }
  }

  logger.info('Collection scraped', {
    collectionId,
    title: listing.title,
    decks: results.length,
    cards: results.reduce((sum, result) => sum + result.cards.length, 0),
    failed: failed.length,
  });
  return { collectionId, title: listing.title, decks, results, failed };
}
