import { load } from 'cheerio';
import type { BrowserSession } from '../browser/browser_session';
import { waitForAnySelector, waitUntil } from '../browser/wait';
import { getLogger } from '../logging/logger';
import { parseDeckDetails, type PatientEntry } from './deck_metadata';
import { cardIdFromUrl } from './sequential_strategy';
import { applyLimit, type DiscoveryRequest, type DiscoveryResult, type DiscoveryStrategy, type StrategyOptions } from './strategy';
import { detailsUrl } from '../extraction/types';

const logger = getLogger('per-patient');

export const CARD_LINK_SELECTORS = [
  "a[href*='/card/']",
  "button[onclick*='card']",
  "form[action*='/card/']",
  '[data-card-id]',
  "a[href*='/deck/']",
];

const CARD_LAUNCHER_TEXT = /start|view|case|question|card/i;
const CARD_ID = /\/card\/(\d+)/;

export function patientUrl(host: string, rel: string): string {
  return `${host}/patient/${rel}`;
}

/**
 * The first card id a patient page links to, from an href, onclick or form
 * action, or a data-card-id attribute.
 */
export function findCardIdOnPatientPage(html: string): string | null {
  const $ = load(html);
  for (const selector of CARD_LINK_SELECTORS) {
    for (const element of $(selector).toArray()) {
      const node = $(element);
      for (const attribute of ['href', 'onclick', 'action']) {
        const match = CARD_ID.exec(node.attr(attribute) ?? '');
        if (match) {
          return match[1];
        }
      }
      const dataId = node.attr('data-card-id')?.trim();
      if (dataId) {
        return dataId;
      }
    }
  }
  return null;
}

/**
 * Visits each patient listed on the details page and takes the card its
 * page leads to. The limit applies to patients. Each card is paired with
 * the patient whose page produced it.
 */
export function createPatientStrategy(options: StrategyOptions = {}): DiscoveryStrategy {
  const timeoutMs = options.waitTimeoutMs;

  async function cardForPatient(session: BrowserSession, host: string, patient: PatientEntry): Promise<string | null> {
    await session.goto(patientUrl(host, patient.rel));
    await waitForAnySelector(session, [...CARD_LINK_SELECTORS, 'body'], { timeoutMs });

    const linked = findCardIdOnPatientPage(await session.content());
    if (linked) {
      return linked;
    }

    if (await session.clickText('a, button', CARD_LAUNCHER_TEXT)) {
      await waitUntil(() => cardIdFromUrl(session.currentUrl()) !== null, { timeoutMs });
      return cardIdFromUrl(session.currentUrl());
    }
    return null;
  }

  return {
    method: 'per-patient',

    async discover(session: BrowserSession, request: DiscoveryRequest): Promise<DiscoveryResult | null> {
      const { deck } = request;
      let entries = request.details.patientEntries;
      if (entries.length === 0) {
        // Details may have been read before the patient list rendered
        await session.goto(detailsUrl(deck));
        await waitForAnySelector(session, ['div.patients', '[rel]'], { timeoutMs });
        entries = parseDeckDetails(await session.content()).patientEntries;
      }
      if (entries.length === 0) {
        logger.info('No patient entries on details page', { deckId: deck.deckId });
        return null;
      }

      const cardIds: string[] = [];
      const patients: string[] = [];

      for (const patient of applyLimit(entries, request.limit)) {
        const cardId = await cardForPatient(session, deck.host, patient);
        if (cardId === null) {
          logger.warn('No card found for patient', { deckId: deck.deckId, patient: patient.name });
          continue;
        }
        if (cardIds.includes(cardId)) {
          continue;
        }
        cardIds.push(cardId);
        patients.push(patient.name);
      }

      if (cardIds.length === 0) {
        return null;
      }

      logger.info('Per-patient walk found cards', { deckId: deck.deckId, count: cardIds.length });
      return { method: 'per-patient', cardIds, patients, isSequential: false };
    },
  };
}
