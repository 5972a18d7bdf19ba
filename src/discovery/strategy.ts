/**
 * Card discovery contract.
 *
 * Each strategy finds a deck's card ids its own way. A strategy that finds
 * nothing resolves null and the coordinator moves on to the next one.
 */

import type { BrowserSession } from '../browser/browser_session';
import type { DeckRef } from '../extraction/types';
import type { DeckDetails } from './deck_metadata';

export type DiscoveryMethod = 'printdeck' | 'sequential' | 'per-patient';

export interface DiscoveryRequest {
  deck: DeckRef;
  details: DeckDetails;
  /** Upper bound on cards, or patients for the per-patient walk */
  limit?: number;
}

export interface DiscoveryResult {
  method: DiscoveryMethod;
  cardIds: string[];
  /**
   * Patient label per card id, by position. Empty when the method cannot
   * tell which patient a card belongs to.
   */
  patients: string[];
  isSequential: boolean;
}

export interface DiscoveryStrategy {
  readonly method: DiscoveryMethod;
  discover(session: BrowserSession, request: DiscoveryRequest): Promise<DiscoveryResult | null>;
}

export interface StrategyOptions {
  /** Per-wait timeout while the strategy drives the browser */
  waitTimeoutMs?: number;
}

export function applyLimit<T>(items: T[], limit?: number): T[] {
  return limit !== undefined && limit > 0 ? items.slice(0, limit) : items;
}
