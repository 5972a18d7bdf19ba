/**
 * Card and deck records shared by discovery, extraction and export.
 */

/** Patient label that marks cards found by the sequential walkthrough */
export const SEQUENTIAL_PATIENT = 'Sequential Deck';

export const UNKNOWN_PATIENT = 'Unknown Patient';

/** Separator between correct option texts in a card's answer */
export const ANSWER_DELIMITER = ' ||| ';

export const NO_ANSWER = '[No Answer Found]';

export const NO_QUESTION = '[No Question]';

export const OPEN_ENDED_ANSWER = '[Open-ended question - no preset answer]';

/**
 * One answer choice as the site lists it.
 */
export interface CardOption {
  /** Value the solution endpoint reports for this choice */
  id: string;
  text: string;
}

/**
 * A scraped flashcard, ready for export.
 */
export interface Card {
  readonly id: string;
  /** Rendered front: background, question text and generated options */
  readonly question: string;
  /** Correct option texts joined by ANSWER_DELIMITER, or free-text feedback */
  readonly answer: string;
  readonly explanation: string;
  readonly background: string;
  /** Grouping label; SEQUENTIAL_PATIENT for sequential cards */
  readonly patientInfo: string;
  readonly isMulti: boolean;
  readonly freetext: boolean;
  readonly isSequential: boolean;
  readonly tags: readonly string[];
  readonly scoreText: string;
  readonly percent: string;
  readonly deckTitle: string;
  readonly sources: readonly string[];
  readonly options: readonly CardOption[];
}

/**
 * A deck as listed on a collection page.
 */
export interface DeckInfo {
  deckId: string;
  bagId: string;
  title: string;
  detailsUrl: string;
}

/**
 * What the scrapers need to address one deck.
 */
export interface DeckRef {
  host: string;
  deckId: string;
  bagId: string;
  title: string;
}

export function detailsUrl(deck: Pick<DeckRef, 'host' | 'deckId' | 'bagId'>): string {
  return `${deck.host}/details/${deck.deckId}?bag_id=${deck.bagId}`;
}

export function cardUrl(host: string, cardId: string): string {
  // No bag_id: card pages answer 403 when one is present
  return `${host}/card/${cardId}`;
}
