/**
 * Sequential walkthrough discovery.
 *
 * Sequential decks only reveal the next card after the current one has been
 * answered, so the strategy plays through the deck: read the card id from
 * the URL, submit, press "next", repeat. A page without a card id still
 * counts as an iteration. The walk stops on a repeated id, once the
 * expected count is reached, when there is no next control or after an
 * iteration cap.
 */

import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector, waitUntil } from '../browser/wait';
import { getLogger } from '../logging/logger';
import { SEQUENTIAL_PATIENT } from '../extraction/types';
import type { DiscoveryRequest, DiscoveryResult, DiscoveryStrategy, StrategyOptions } from './strategy';

const logger = getLogger('sequential');

const CARD_ID_IN_URL = /\/card\/(\d+)/;

/** Floor of the iteration cap, whatever the expected count */
export const MIN_ITERATION_CAP = 50;

/** Extra iterations allowed past the expected count */
export const ITERATION_SLACK = 3;

export const SUBMIT_SELECTORS = [
  '#workspace > div.solution.container > form > div.submit > button',
  "button[type='submit']",
  "input[type='submit']",
  "button[onclick*='submit']",
  'form button',
];

export const NEXT_SELECTORS = [
  '#feedback > div.actions > span.controls #next',
  '#next',
  "button[onclick*='next']",
  "button[onclick*='continue']",
  "a[href*='next']",
  '.next',
  '.continue',
  '.next-card',
  '.btn-next',
];

const NEXT_TEXT = /Next Card|Next|Continue/i;

export function sequentialUrl(host: string, deckId: string): string {
  return `${host}/deck/${deckId}?timer-enabled=1&mode=sequential`;
}

export function cardIdFromUrl(url: string): string | null {
  return CARD_ID_IN_URL.exec(url)?.[1] ?? null;
}

export function iterationCap(expected: number): number {
  return Math.max(expected + ITERATION_SLACK, MIN_ITERATION_CAP);
}

async function clickFirst(session: BrowserSession, selectors: readonly string[]): Promise<boolean> {
  for (const selector of selectors) {
    if (await session.click(selector)) {
      return true;
    }
  }
  return false;
}

/**
 * Submit the current card. Cards that refuse an empty submission get their
 * first radio option picked first.
 */
async function submitCurrentCard(session: BrowserSession): Promise<boolean> {
  if (await clickFirst(session, SUBMIT_SELECTORS)) {
    return true;
  }
  if (await session.click("input[type='radio']")) {
    return clickFirst(session, SUBMIT_SELECTORS);
  }
  return false;
}

async function advance(session: BrowserSession, timeoutMs?: number): Promise<boolean> {
  await waitForAnySelector(session, NEXT_SELECTORS, { timeoutMs });
  if (await clickFirst(session, NEXT_SELECTORS)) {
    return true;
  }
  return session.clickText('a, button', NEXT_TEXT);
}

export function createSequentialStrategy(options: StrategyOptions = {}): DiscoveryStrategy {
  const timeoutMs = options.waitTimeoutMs;

  return {
    method: 'sequential',

    async discover(session: BrowserSession, request: DiscoveryRequest): Promise<DiscoveryResult | null> {
      const { deck } = request;
      const expected =
        request.limit !== undefined && request.limit > 0
          ? Math.min(request.details.expectedQuestions, request.limit)
          : request.details.expectedQuestions;
      const cap = iterationCap(expected);

      await session.goto(sequentialUrl(deck.host, deck.deckId));

      const cardIds: string[] = [];
      const seen = new Set<string>();

      for (let iteration = 1; iteration <= cap; iteration++) {
        await waitUntil(() => cardIdFromUrl(session.currentUrl()) !== null, { timeoutMs });
        const url = session.currentUrl();
        const cardId = cardIdFromUrl(url);

        if (cardId === null) {
          // Counted against the cap without recording anything
          logger.debug('No card id in sequential URL', { deckId: deck.deckId, url, iteration });
        } else {
          if (seen.has(cardId)) {
            logger.info('Sequential walk looped back', { deckId: deck.deckId, cardId });
            break;
          }
          seen.add(cardId);
          cardIds.push(cardId);
          logger.debug('Sequential card', { deckId: deck.deckId, cardId, position: cardIds.length, expected });

          if (cardIds.length >= expected) {
            break;
          }
        }

        if (!(await submitCurrentCard(session))) {
          logger.warn('No submit control on sequential page', { deckId: deck.deckId, url });
        }
        if (!(await advance(session, timeoutMs))) {
          logger.info('No next control; sequential walk finished', { deckId: deck.deckId, url });
          break;
        }
        await waitUntil(() => session.currentUrl() !== url, { timeoutMs });
      }

      if (cardIds.length === 0) {
        return null;
      }

      logger.info('Sequential walk finished', { deckId: deck.deckId, count: cardIds.length, expected });
      return {
        method: 'sequential',
        cardIds,
        patients: cardIds.map(() => SEQUENTIAL_PATIENT),
        isSequential: true,
      };
    },
  };
}
