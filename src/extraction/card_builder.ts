/**
 * Card assembly from a parsed card page and its solution.
 */

import { normalizeHtml } from '../content/html_normalize';
import { escapeAttribute, escapeHtml } from '../content/text';
import { isFreetextPage, type ParsedCardPage } from './card_page';
import type { Solution } from './solution_client';
import {
  ANSWER_DELIMITER,
  NO_ANSWER,
  NO_QUESTION,
  OPEN_ENDED_ANSWER,
  SEQUENTIAL_PATIENT,
  UNKNOWN_PATIENT,
  type Card,
  type CardOption,
} from './types';

export const SEQUENTIAL_TAG = 'Sequential_Extraction';

export interface CardContext {
  deckTitle: string;
  /** Patient assigned by discovery; takes precedence over the page's own label */
  patientInfo?: string;
  isSequential: boolean;
}

export interface CardContent {
  page: ParsedCardPage;
  /** Background HTML, portraits already removed */
  background: string;
  /** Embedded-images block, or an empty string */
  images: string;
  solution: Solution;
}

/**
 * Clickable option list for the card front. Input ids are unique per card
 * so several cards can share one review screen.
 */
export function renderOptions(cardId: string, options: readonly CardOption[], isMulti: boolean): string {
  const inputType = isMulti ? 'checkbox' : 'radio';
  return options
    .map((option, index) => {
      const inputId = `choice_${cardId}_${index}`;
      return (
        '<div class="option">' +
        `<input type="${inputType}" name="choice" id="${inputId}" value="${escapeAttribute(option.text)}">` +
        `<label for="${inputId}">${escapeHtml(option.text)}</label>` +
        '</div>'
      );
    })
    .join('');
}

/**
 * Texts of the correct options. When the solution names none of the
 * page's options, the first option stands in.
 */
export function correctOptionTexts(options: readonly CardOption[], answerIds: readonly string[]): string[] {
  const wanted = new Set(answerIds);
  const correct = options.filter((option) => wanted.has(option.id)).map((option) => option.text);
  if (correct.length === 0 && options.length > 0) {
    return [options[0].text];
  }
  return correct;
}

/**
 * Percent shown on the card back: the numeric score when positive, else a
 * percentage quoted in the score text, else 100% when the solution names a
 * correct option and 0% when it does not.
 */
export function computePercent(solution: Solution, options: readonly CardOption[]): string {
  if (solution.score !== null && solution.score > 0) {
    return `${solution.score}%`;
  }

  const quoted = /(\d+)%/.exec(solution.scoreText);
  if (quoted) {
    return `${quoted[1]}%`;
  }

  const optionIds = new Set(options.map((option) => option.id));
  return solution.answers.some((id) => optionIds.has(id)) ? '100%' : '0%';
}

export function buildFront(background: string, question: string, body: string): string {
  const parts: string[] = [];
  if (background) {
    parts.push(`<div class="background">${background}</div>`);
  }
  parts.push(`<div class="question"><b>${escapeHtml(question)}</b></div>`);
  parts.push(body);
  return parts.join('');
}

function patientLabel(page: ParsedCardPage, context: CardContext): string {
  if (context.isSequential) {
    return SEQUENTIAL_PATIENT;
  }
  return context.patientInfo ?? page.patientInfo ?? UNKNOWN_PATIENT;
}

/**
 * Build the exported card. Free-text cards keep the site's answer box on the
 * front and carry the instructor feedback as their answer.
 */
export function buildCard(content: CardContent, context: CardContext): Card {
  const { page, solution } = content;
  const question = page.question ?? NO_QUESTION;
  const background = `${content.images}${content.background}`;
  const feedback = normalizeHtml(solution.feedback.trim());
  const freetext = isFreetextPage(page);

  const shared = {
    id: page.cardId,
    background,
    patientInfo: patientLabel(page, context),
    isMulti: freetext ? false : page.isMulti,
    freetext,
    isSequential: context.isSequential,
    tags: context.isSequential ? [SEQUENTIAL_TAG] : [],
    scoreText: solution.scoreText.trim(),
    deckTitle: context.deckTitle,
    sources: [],
    options: page.options,
  };

  if (freetext) {
    return {
      ...shared,
      question: buildFront(background, question, page.freetextHtml ?? ''),
      answer: feedback || OPEN_ENDED_ANSWER,
      explanation: '',
      percent: computePercent(solution, []),
    };
  }

  const correct = correctOptionTexts(page.options, solution.answers);
  const optionsHtml = `<div class="options">${renderOptions(page.cardId, page.options, page.isMulti)}</div>`;

  return {
    ...shared,
    question: buildFront(background, question, optionsHtml),
    answer: correct.length > 0 ? correct.join(ANSWER_DELIMITER) : NO_ANSWER,
    explanation: feedback,
    percent: computePercent(solution, page.options),
  };
}

/** Whether a page yielded nothing worth exporting */
export function isEmptyCardPage(page: ParsedCardPage, background: string): boolean {
  return page.question === null && background.trim() === '';
}
