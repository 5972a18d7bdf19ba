/**
 * Background content of a card page.
 *
 * Collects, in order: vital-signs monitors, data tables, chart placeholders
 * and free-text blocks from the card container, then drops fragments whose
 * visible text repeats an earlier one.
 */

import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { getKeywordTable, type KeywordTable } from './keyword_tables';
import { collapseText, escapeHtml } from './text';
import { extractVitals, MONITOR_SELECTOR, renderVitals } from './vital_signs';

// ============================================================================
// Types
// ============================================================================

export type BackgroundPartKind = 'vitals' | 'table' | 'chart' | 'medical' | 'options' | 'text';

export interface BackgroundPart {
  kind: BackgroundPartKind;
  html: string;
}

// ============================================================================
// Constants
// ============================================================================

/** Fragments whose normalized text is this short or shorter are dropped */
export const MIN_PART_TEXT_LENGTH = 20;

/** Backgrounds shorter than this get the fallback text pass */
export const MIN_BACKGROUND_LENGTH = 50;

const BLOCK_MIN_TEXT = 20;
const LEAF_DIV_MIN_TEXT = 30;
const PARAGRAPH_MIN_TEXT = 20;
const FALLBACK_MAX_PARTS = 3;

const PART_SEPARATOR = '<br/><br/>';

const TABLE_STYLE = 'border-collapse: collapse; margin: 10px 0; border: 1px solid #ccc; width: 100%;';
const CELL_STYLE = 'border: 1px solid #ccc; padding: 8px;';
const HEADER_CELL_STYLE = 'border: 1px solid #ccc; padding: 8px; background: #f5f5f5; font-weight: bold;';

// ============================================================================
// Extraction
// ============================================================================

function cardContainers($: CheerioAPI): Cheerio<Element> {
  const direct = $('body > div > div.container.card');
  return direct.length > 0 ? direct : $('div.container.card');
}

function styleTable($: CheerioAPI, table: Cheerio<Element>): string {
  const copy = table.clone();
  copy.attr('style', TABLE_STYLE);
  copy.find('td').attr('style', CELL_STYLE);
  copy.find('th').attr('style', HEADER_CELL_STYLE);
  return $.html(copy);
}

function classifyBlock(text: string, table: KeywordTable): BackgroundPartKind {
  if (table.background.optionMarkers.some((marker) => text.includes(marker))) {
    return 'options';
  }
  const lower = text.toLowerCase();
  if (table.background.medical.some((word) => lower.includes(word))) {
    return 'medical';
  }
  return 'text';
}

function renderBlock(kind: BackgroundPartKind, text: string): string {
  switch (kind) {
    case 'medical':
      return `<div><h4>Medical Information:</h4><p>${escapeHtml(text)}</p></div>`;
    case 'options':
      return `<div><h4>Question Options:</h4><p>${escapeHtml(text)}</p></div>`;
    default:
      return `<div><p>${escapeHtml(text)}</p></div>`;
  }
}

/**
 * Collect every candidate background fragment from a card page, before
 * deduplication.
 */
export function collectBackgroundParts($: CheerioAPI, table: KeywordTable = getKeywordTable()): BackgroundPart[] {
  const parts: BackgroundPart[] = [];

  $(MONITOR_SELECTOR).each((_, monitor) => {
    parts.push({ kind: 'vitals', html: renderVitals(extractVitals($(monitor))) });
  });

  const containers = cardContainers($);

  let tableIndex = 0;
  containers.find('table').each((_, element) => {
    const tableElement = $(element);
    if (tableElement.closest(MONITOR_SELECTOR).length > 0) {
      return;
    }
    tableIndex++;
    parts.push({
      kind: 'table',
      html: `<div><h4>Medical Data Table ${tableIndex}:</h4>${styleTable($, tableElement)}</div>`,
    });
  });

  containers.find('canvas').each((index, element) => {
    const id = $(element).attr('id') || `Chart_${index + 1}`;
    parts.push({
      kind: 'chart',
      html:
        '<div style="border: 1px solid #ccc; padding: 10px; margin: 10px 0;">' +
        `<h4>Medical Chart: ${escapeHtml(id)}</h4><p>Interactive chart/graph content</p></div>`,
    });
  });

  containers.find('div.block.group').each((_, element) => {
    const block = $(element);
    if (block.find(`table, canvas, .monitor`).length > 0) {
      return;
    }
    const text = collapseText(block.text());
    if (text.length <= BLOCK_MIN_TEXT) {
      return;
    }
    const kind = classifyBlock(text, table);
    parts.push({ kind, html: renderBlock(kind, text) });
  });

  if (parts.length > 0) {
    return parts;
  }

  // Nothing structured: fall back to leaf divs, then paragraphs
  const seen = new Set<string>();
  containers.find('div').each((_, element) => {
    const div = $(element);
    if (div.find('div, table, canvas, img, form').length > 0) {
      return;
    }
    const text = collapseText(div.text());
    if (text.length > LEAF_DIV_MIN_TEXT && !seen.has(text)) {
      seen.add(text);
      parts.push({ kind: 'text', html: `<div><p>${escapeHtml(text)}</p></div>` });
    }
  });

  if (parts.length === 0) {
    containers.find('p').each((_, element) => {
      const text = collapseText($(element).text());
      if (text.length > PARAGRAPH_MIN_TEXT && !seen.has(text)) {
        seen.add(text);
        parts.push({ kind: 'text', html: `<p>${escapeHtml(text)}</p>` });
      }
    });
  }

  return parts;
}

/**
 * Keep the first fragment of every distinct visible text. Fragments whose
 * whitespace-collapsed text is MIN_PART_TEXT_LENGTH characters or shorter
 * are dropped.
 */
export function dedupeParts(parts: BackgroundPart[]): BackgroundPart[] {
  const seen = new Set<string>();
  const unique: BackgroundPart[] = [];
  for (const part of parts) {
    const key = collapseText(load(part.html, null, false).root().text());
    if (key.length <= MIN_PART_TEXT_LENGTH || seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push({ kind: part.kind, html: part.html.trim() });
  }
  return unique;
}

/**
 * Build the background HTML of a card page.
 *
 * @returns fragments joined by blank lines, or an empty string
 */
export function extractBackground(html: string, table: KeywordTable = getKeywordTable()): string {
  const $ = load(html);
  return dedupeParts(collectBackgroundParts($, table))
    .map((part) => part.html)
    .join(PART_SEPARATOR);
}

/**
 * Last-resort background: the first few paragraphs and text-only divs of
 * the card container.
 */
export function fallbackText(html: string): string {
  const $ = load(html);
  const parts: string[] = [];
  const seen = new Set<string>();

  cardContainers($).each((_, container) => {
    $(container)
      .find('p')
      .each((__, element) => {
        const text = collapseText($(element).text());
        if (text.length > PARAGRAPH_MIN_TEXT && !seen.has(text)) {
          seen.add(text);
          parts.push(`<p>${escapeHtml(text)}</p>`);
        }
      });

    $(container)
      .find('div')
      .each((__, element) => {
        const div = $(element);
        if (div.find('p, table, img, canvas').length > 0) {
          return;
        }
        const text = collapseText(div.text());
        if (text.length > LEAF_DIV_MIN_TEXT && !seen.has(text)) {
          seen.add(text);
          parts.push(`<div>${escapeHtml(text)}</div>`);
        }
      });
  });

  return parts.slice(0, FALLBACK_MAX_PARTS).join('<br/>');
}

/**
 * Background with the fallback pass applied when the structured pass found
 * too little.
 */
export function buildBackground(html: string, table: KeywordTable = getKeywordTable()): string {
  const background = extractBackground(html, table);
  if (background.trim().length >= MIN_BACKGROUND_LENGTH) {
    return background;
  }
  return fallbackText(html) || background;
}
