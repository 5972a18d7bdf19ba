/**
 * Target URL parsing.
 *
 * Accepts exactly two shapes on the configured host:
 *   /details/{deckId}?bag_id={bagId}
 *   /collection/{collectionId}
 */

import { NavigationError } from '../errors';

export interface DeckTarget {
  kind: 'deck';
  host: string;
  deckId: string;
  bagId: string;
  detailsUrl: string;
}

export interface CollectionTarget {
  kind: 'collection';
  host: string;
  collectionId: string;
}

export type Target = DeckTarget | CollectionTarget;

const DETAILS_PATH = /^\/details\/(\d+)\/?$/;
const COLLECTION_PATH = /^\/collection\/(\d+)\/?$/;
const NUMERIC = /^\d+$/;

/**
 * Parse and validate a user-supplied URL.
 *
 * @param raw - URL as typed by the user
 * @param expectedHost - origin of the cards site, e.g. https://cards.ucalgary.ca
 * @param defaultBagId - bag used when a deck URL has no bag_id; the deck id otherwise
 * @throws NavigationError when the URL is malformed, off-site or not a deck/collection URL
 */
export function parseTargetUrl(raw: string, expectedHost: string, defaultBagId?: string): Target {
  const trimmed = raw.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new NavigationError(`Not a valid URL: ${trimmed}`, { url: trimmed });
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new NavigationError(`Unsupported URL scheme: ${url.protocol}`, { url: trimmed });
  }

  if (!isSameSite(url, expectedHost)) {
    throw new NavigationError(`URL is not on ${new URL(expectedHost).hostname}: ${trimmed}`, { url: trimmed });
  }

  const details = DETAILS_PATH.exec(url.pathname);
  if (details) {
    const deckId = details[1];
    const bagParam = url.searchParams.get('bag_id');
    if (bagParam !== null && !NUMERIC.test(bagParam)) {
      throw new NavigationError(`bag_id must be numeric: ${bagParam}`, { url: trimmed });
    }
    return {
      kind: 'deck',
      host: url.origin,
      deckId,
      bagId: bagParam ?? defaultBagId ?? deckId,
      detailsUrl: url.toString(),
    };
  }

  const collection = COLLECTION_PATH.exec(url.pathname);
  if (collection) {
    return { kind: 'collection', host: url.origin, collectionId: collection[1] };
  }

  throw new NavigationError(
    'URL must point at a deck (/details/{id}?bag_id={id}) or a collection (/collection/{id})',
    { url: trimmed }
  );
}

/**
 * Whether a URL is on the cards site. Subdomain-for-subdomain equality; the
 * scheme may differ so an http link to an https site still matches.
 */
export function isSameSite(url: URL, expectedHost: string): boolean {
  let expected: URL;
  try {
    expected = new URL(expectedHost);
  } catch {
    return false;
  }
  return url.hostname.toLowerCase() === expected.hostname.toLowerCase();
}

/** Whether a path carries a recognizable deck or collection segment. */
export function hasDeckOrCollectionPath(pathname: string): boolean {
  return /\/(details|collection)\/\d+/.test(pathname);
}
