import { load } from 'cheerio';
import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector } from '../browser/wait';
import { getLogger } from '../logging/logger';
import { applyLimit, type DiscoveryRequest, type DiscoveryResult, type DiscoveryStrategy, type StrategyOptions } from './strategy';

const logger = getLogger('printdeck');

const SOLUTION_BUTTON_SELECTOR = "div.submit button[rel*='/solution/']";
const SOLUTION_ID = /\/solution\/(\d+)\//;

export function printdeckUrl(host: string, deckId: string, bagId: string): string {
  return `${host}/printdeck/${deckId}?bag_id=${bagId}`;
}

/** Whether the printdeck page is an access-denied page */
export function isPrintdeckDenied(title: string, html: string): boolean {
  return title.includes('Error 403') || html.includes('Access denied');
}

/**
 * Card ids from the printdeck listing, in page order without duplicates.
 */
export function parsePrintdeckIds(html: string): string[] {
  const $ = load(html);
  const ids: string[] = [];
  $(SOLUTION_BUTTON_SELECTOR).each((_, element) => {
    const match = SOLUTION_ID.exec($(element).attr('rel') ?? '');
    if (match && !ids.includes(match[1])) {
      ids.push(match[1]);
    }
  });
  return ids;
}

/**
 * Reads every card id off the deck's printable view. Many decks deny it.
 */
export function createPrintdeckStrategy(options: StrategyOptions = {}): DiscoveryStrategy {
  return {
    method: 'printdeck',

    async discover(session: BrowserSession, request: DiscoveryRequest): Promise<DiscoveryResult | null> {
      const { deck } = request;
      await session.goto(printdeckUrl(deck.host, deck.deckId, deck.bagId));
      await waitForAnySelector(session, [SOLUTION_BUTTON_SELECTOR, 'body'], { timeoutMs: options.waitTimeoutMs });

      const html = await session.content();
      if (isPrintdeckDenied(await session.title(), html)) {
        logger.info('Printdeck access denied', { deckId: deck.deckId });
        return null;
      }

      const cardIds = applyLimit(parsePrintdeckIds(html), request.limit);
      if (cardIds.length === 0) {
        return null;
      }

      logger.info('Printdeck listed cards', { deckId: deck.deckId, count: cardIds.length });
      return { method: 'printdeck', cardIds, patients: [], isSequential: false };
    },
  };
}
