/**
 * Card page parsing.
 */

import { load, type CheerioAPI } from 'cheerio';
import { collapseText } from '../content/text';
import type { CardOption } from './types';

export const QUESTION_SELECTOR = '#workspace > div.solution.container > form > h3';
export const FORM_SELECTOR = '#workspace > div.solution.container > form';
export const OPTION_SELECTOR = '#workspace > div.solution.container > form > div.options > div.option';
export const FREETEXT_SELECTOR = 'div.freetext-answer';

/** Selectors whose presence means a card page has rendered */
export const CARD_READY_SELECTORS = [FORM_SELECTOR, 'div.container.card', FREETEXT_SELECTOR];

export interface ParsedCardPage {
  cardId: string;
  /** Question text, or null when the page has none */
  question: string | null;
  options: CardOption[];
  isMulti: boolean;
  /** Outer HTML of the free-text answer box, when the card is open-ended */
  freetextHtml: string | null;
  /** Patient named on the page itself, if any */
  patientInfo: string | null;
}

const PATIENT_ID = /\/patient\/([^/?#]+)/;

function parseOptions($: CheerioAPI): CardOption[] {
  const options: CardOption[] = [];
  $(OPTION_SELECTOR).each((index, element) => {
    const option = $(element);
    const text = collapseText(option.find('label').first().text());
    if (!text) {
      return;
    }
    const id = option.find('input').first().attr('value') ?? String(index);
    options.push({ id, text });
  });
  return options;
}

/**
 * The patient a card belongs to, from a patient link or the breadcrumbs.
 */
export function parsePatientInfo($: CheerioAPI): string | null {
  const link = $("a[href*='/patient/']").first();
  if (link.length > 0) {
    const text = collapseText(link.text());
    if (text) {
      return text;
    }
    const match = PATIENT_ID.exec(link.attr('href') ?? '');
    if (match) {
      return `Patient ${match[1]}`;
    }
  }

  let fromBreadcrumb: string | null = null;
  $('.breadcrumb a, .nav a, .patient-info').each((_, element) => {
    const text = collapseText($(element).text());
    if (text && (text.toLowerCase().includes('patient') || /^\d+$/.test(text))) {
      fromBreadcrumb = text;
      return false;
    }
    return undefined;
  });
  return fromBreadcrumb;
}

export function parseCardPage(html: string, cardId: string): ParsedCardPage {
  const $ = load(html);
  const questionText = collapseText($(QUESTION_SELECTOR).first().text());
  const freetext = $(FREETEXT_SELECTOR).first();

  return {
    cardId,
    question: questionText || null,
    options: parseOptions($),
    isMulti: $(FORM_SELECTOR).first().attr('rel') === 'pickmany',
    freetextHtml: freetext.length > 0 ? $.html(freetext) : null,
    patientInfo: parsePatientInfo($),
  };
}

/** Open-ended card: an answer box and no options */
export function isFreetextPage(page: ParsedCardPage): boolean {
  return page.freetextHtml !== null && page.options.length === 0;
}

/**
 * Length of the visible text in the card's workspace, or the whole body
 * when the page has no workspace.
 */
export function cardTextLength(html: string): number {
  const $ = load(html);
  const workspace = $('#workspace, div.container.card');
  return collapseText((workspace.length > 0 ? workspace : $('body')).text()).length;
}
