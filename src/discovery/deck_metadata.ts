/**
 * Deck details page parsing: the expected question count and the patient
 * list.
 */

import { load, type CheerioAPI } from 'cheerio';
import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector } from '../browser/wait';
import { collapseText } from '../content/text';
import { getLogger } from '../logging/logger';
import { detailsUrl, UNKNOWN_PATIENT, type DeckRef } from '../extraction/types';

const logger = getLogger('deck-metadata');

/** Assumed question count when the details page shows no counter */
export const DEFAULT_EXPECTED_QUESTIONS = 5;

const COUNTER_PATTERNS = [/Correct:\s*(\d+)\s+of\s+(\d+)/gi, /Correct\s*(\d+)\s+of\s+(\d+)/gi, /(\d+)\s+of\s+(\d+)/gi];

const PATIENT_NAME_SELECTORS = [
  'div.patients > div > h3',
  'div.patients h3',
  'div.patients h4',
  'div.patients .patient-name',
  '.patient h3',
  '.patient-title',
  "h3[class*='patient']",
  "div[class*='patient'] h3",
];

const PATIENT_ENTRY_SELECTORS = [
  'div.patients > div.patient[rel]',
  'div.patient[rel]',
  '.patient[rel]',
  "[class*='patient'][rel]",
];

/** Selectors that mean the details page has rendered */
export const DETAILS_READY_SELECTORS = ['div.patients', '.deck-details', '#workspace', 'body'];

export interface PatientEntry {
  /** Patient id carried in the `rel` attribute */
  rel: string;
  name: string;
}

export interface DeckDetails {
  expectedQuestions: number;
  patients: string[];
  patientEntries: PatientEntry[];
}

/**
 * The deck's question total from its "Correct: X of Y" counter. The last
 * counter with a non-zero total wins.
 */
export function parseExpectedQuestions(text: string): number {
  for (const pattern of COUNTER_PATTERNS) {
    const totals = Array.from(text.matchAll(pattern), (match) => Number(match[2])).filter((total) => total > 0);
    if (totals.length > 0) {
      return totals[totals.length - 1];
    }
  }
  return DEFAULT_EXPECTED_QUESTIONS;
}

export function parsePatientNames($: CheerioAPI): string[] {
  for (const selector of PATIENT_NAME_SELECTORS) {
    const names = $(selector)
      .toArray()
      .map((element) => collapseText($(element).text()))
      .filter((name) => name.length > 2);
    if (names.length > 0) {
      return names;
    }
  }

  const linked = $("a[href*='/patient/']")
    .toArray()
    .map((element) => collapseText($(element).text()))
    .filter((name) => name.length > 0);
  return linked.length > 0 ? linked : [UNKNOWN_PATIENT];
}

export function parsePatientEntries($: CheerioAPI): PatientEntry[] {
  for (const selector of PATIENT_ENTRY_SELECTORS) {
    const entries: PatientEntry[] = [];
    $(selector).each((_, element) => {
      const node = $(element);
      const rel = node.attr('rel')?.trim();
      if (!rel) {
        return;
      }
      const name = collapseText(node.find('h3').first().text()) || `Patient ${rel}`;
      entries.push({ rel, name });
    });
    if (entries.length > 0) {
      return entries;
    }
  }
  return [];
}

export function parseDeckDetails(html: string): DeckDetails {
  const $ = load(html);
  return {
    expectedQuestions: parseExpectedQuestions($('body').text()),
    patients: parsePatientNames($),
    patientEntries: parsePatientEntries($),
  };
}

/**
 * Load a deck's details page and parse it.
 */
export async function readDeckDetails(
  session: BrowserSession,
  deck: DeckRef,
  options: { timeoutMs?: number } = {}
): Promise<DeckDetails> {
  await session.goto(detailsUrl(deck));
  await waitForAnySelector(session, DETAILS_READY_SELECTORS, { timeoutMs: options.timeoutMs });
  const details = parseDeckDetails(await session.content());
  logger.info('Read deck details', {
    deckId: deck.deckId,
    expectedQuestions: details.expectedQuestions,
    patients: details.patients.length,
  });
  return details;
}
