/**
 * Classifier keyword tables.
 *
 * The lists that drive image and text classification are data, shipped as
 * classifier_keywords.json. A replacement table of the same shape can be
 * loaded at startup to retune classification without a code change.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import bundledTable from './classifier_keywords.json';
import { ConfigError, errorMessage } from '../errors';
import { getLogger } from '../logging/logger';

const logger = getLogger('keywords');

const keywordList = z.array(z.string().min(1)).min(1);

/** Lower-cases every entry; matching is done on lower-cased text. */
const lowerKeywordList = keywordList.transform((words) => words.map((word) => word.toLowerCase()));

export const KeywordTableSchema = z.object({
  version: z.number().int().positive(),
  image: z.object({
    medical: lowerKeywordList,
    ui: lowerKeywordList,
    portrait: lowerKeywordList,
    imageExtensions: lowerKeywordList,
    portraitDirectories: lowerKeywordList,
    portraitFileWords: lowerKeywordList,
    portraitPaths: lowerKeywordList,
    titleWords: lowerKeywordList,
    educational: lowerKeywordList,
  }),
  svg: z.object({
    portrait: lowerKeywordList,
    medical: lowerKeywordList,
  }),
  background: z.object({
    /** Matched case-sensitively against block text */
    optionMarkers: keywordList,
    medical: lowerKeywordList,
  }),
});

export type KeywordTable = z.infer<typeof KeywordTableSchema>;

let activeTable: KeywordTable | null = null;

/**
 * Validate a raw table.
 *
 * @throws ConfigError listing every schema violation
 */
export function parseKeywordTable(raw: unknown, source = 'keyword table'): KeywordTable {
  const parsed = KeywordTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`, { source, issues });
  }
  return parsed.data;
}

/** The table in effect; the bundled one unless replaced. */
export function getKeywordTable(): KeywordTable {
  if (!activeTable) {
    activeTable = parseKeywordTable(bundledTable, 'bundled keyword table');
  }
  return activeTable;
}

/** Replace the table in effect; pass null to return to the bundled one. */
export function useKeywordTable(table: KeywordTable | null): void {
  activeTable = table;
}

/**
 * Read, validate and activate a keyword table from a JSON file.
 */
export async function loadKeywordTableFile(path: string): Promise<KeywordTable> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Could not read keyword table ${path}: ${errorMessage(error)}`, { path });
  }
  const table = parseKeywordTable(raw, `keyword table ${path}`);
  useKeywordTable(table);
  logger.info('Loaded classifier keyword table', { path, version: table.version });
  return table;
}

/** Keywords from `keywords` that occur in `text`. */
export function matchingKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => text.includes(keyword));
}
