import type { BrowserSession } from '../browser/browser_session';
import { DiscoveryError, errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import type { DeckRef } from '../extraction/types';
import { readDeckDetails, type DeckDetails } from './deck_metadata';
import { createPatientStrategy } from './patient_strategy';
import { createPrintdeckStrategy } from './printdeck_strategy';
import { createSequentialStrategy } from './sequential_strategy';
import type { DiscoveryResult, DiscoveryStrategy, StrategyOptions } from './strategy';

const logger = getLogger('discovery');

export interface DeckDiscovery {
  details: DeckDetails;
  result: DiscoveryResult;
}

/** Printdeck, then the sequential walk, then per-patient pages */
export function defaultStrategies(options: StrategyOptions = {}): DiscoveryStrategy[] {
  return [createPrintdeckStrategy(options), createSequentialStrategy(options), createPatientStrategy(options)];
}

/**
 * Run strategies in order until one finds cards. A strategy that throws is
 * logged and treated like one that found nothing.
 *
 * @throws DiscoveryError when every strategy comes back empty
 */
export async function discoverDeck(
  session: BrowserSession,
  deck: DeckRef,
  options: StrategyOptions & { limit?: number; strategies?: DiscoveryStrategy[] } = {}
): Promise<DeckDiscovery> {
  const details = await readDeckDetails(session, deck, { timeoutMs: options.waitTimeoutMs });
  const strategies = options.strategies ?? defaultStrategies(options);
  const tried: string[] = [];

  for (const strategy of strategies) {
    tried.push(strategy.method);
    try {
      const result = await strategy.discover(session, { deck, details, limit: options.limit });
      if (result && result.cardIds.length > 0) {
        logger.info('Discovered cards', { deckId: deck.deckId, method: result.method, count: result.cardIds.length });
        return { details, result };
      }
      logger.info('Discovery strategy found nothing', { deckId: deck.deckId, method: strategy.method });
    } catch (error) {
      logger.warn('Discovery strategy failed', { deckId: deck.deckId, method: strategy.method, error: errorMessage(error) });
    }
  }

  throw new DiscoveryError(`No cards found for deck ${deck.deckId}`, { deckId: deck.deckId, tried });
}
