import { load } from 'cheerio';
import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector } from '../browser/wait';
import { collapseText } from '../content/text';
import { getLogger } from '../logging/logger';
import { detailsUrl, type DeckInfo } from '../extraction/types';

const logger = getLogger('collection');

const DECK_LINK_SELECTOR = "a[href*='/details/']";
const DECK_PATH = /\/details\/(\d+)/;
const MIN_TITLE_LENGTH = 3;

export interface CollectionListing {
  title: string;
  decks: DeckInfo[];
}

export function collectionUrl(host: string, collectionId: string): string {
  return `${host}/collection/${collectionId}`;
}

export function parseCollectionTitle(html: string, collectionId: string): string {
  const $ = load(html);
  const bagName = collapseText($('h3.bag-name').first().text());
  if (bagName.length > MIN_TITLE_LENGTH) {
    return bagName;
  }
  const heading = collapseText($('h1, .collection-title, .page-title').first().text());
  return heading || `Collection ${collectionId}`;
}

/**
 * Decks linked from a collection page, in page order, once each. A link
 * without a bag_id belongs to the collection's own bag.
 */
export function parseCollectionDecks(html: string, host: string, collectionId: string): DeckInfo[] {
  const $ = load(html);
  const decks: DeckInfo[] = [];
  const seen = new Set<string>();

  $(DECK_LINK_SELECTOR).each((_, element) => {
    const link = $(element);
    const href = link.attr('href') ?? '';
    let url: URL;
    try {
      url = new URL(href, `${host}/`);
    } catch {
      return;
    }
    const match = DECK_PATH.exec(url.pathname);
    if (!match || seen.has(match[1])) {
      return;
    }
    seen.add(match[1]);

    const deckId = match[1];
    const bagId = url.searchParams.get('bag_id') || collectionId;
    decks.push({
      deckId,
      bagId,
      title: collapseText(link.text()) || `Deck ${deckId}`,
      detailsUrl: detailsUrl({ host, deckId, bagId }),
    });
  });

  return decks;
}

export async function readCollection(
  session: BrowserSession,
  host: string,
  collectionId: string,
  options: { timeoutMs?: number } = {}
): Promise<CollectionListing> {
  await session.goto(collectionUrl(host, collectionId));
  await waitForAnySelector(session, [DECK_LINK_SELECTOR, 'h3.bag-name'], { timeoutMs: options.timeoutMs });
  const html = await session.content();
  const listing = {
    title: parseCollectionTitle(html, collectionId),
    decks: parseCollectionDecks(html, host, collectionId),
  };
  logger.info('Read collection', { collectionId, title: listing.title, decks: listing.decks.length });
  return listing;
}
