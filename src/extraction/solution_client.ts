/**
 * Solution endpoint client.
 *
 * POST /solution/{id}/ returns the correct option values, instructor
 * feedback and a score. An empty guess is usually enough; some cards only
 * answer once every option has been guessed.
 */

import { z } from 'zod';
import { SolutionError } from '../errors';
import { responseText, type FormFields, type HttpClient, type HttpResponse } from '../fast/http_client';
import { getLogger } from '../logging/logger';
import type { CardOption } from './types';

const logger = getLogger('solution');

// ============================================================================
// Types
// ============================================================================

/** Payload variants the endpoint accepts */
export type SolutionPayload = 'empty' | 'all-options' | 'freetext';

export interface Solution {
  /** Values of the correct options */
  answers: string[];
  /** Instructor feedback HTML */
  feedback: string;
  scoreText: string;
  score: number | null;
}

export type SolutionResult =
  | { kind: 'solution'; payload: SolutionPayload; solution: Solution }
  /** Login page, 401/403 or HTML where JSON was expected */
  | { kind: 'auth'; payload: SolutionPayload; status: number }
  | { kind: 'invalid'; payload: SolutionPayload; status: number; reason: string };

// ============================================================================
// Parsing
// ============================================================================

const SolutionSchema = z.object({
  answers: z
    .array(z.union([z.string(), z.number()]))
    .nullish()
    .transform((answers) => (answers ?? []).map(String)),
  feedback: z.string().nullish().transform((value) => value ?? ''),
  scoreText: z.string().nullish().transform((value) => value ?? ''),
  score: z
    .union([z.number(), z.string()])
    .nullish()
    .transform((value) => {
      if (value === null || value === undefined || value === '') {
        return null;
      }
      const numeric = typeof value === 'number' ? value : Number(value);
      return Number.isFinite(numeric) ? numeric : null;
    }),
});

/** Stand-in when the endpoint gives nothing: the first option becomes the answer */
export const EMPTY_SOLUTION: Solution = { answers: [], feedback: '', scoreText: '', score: null };

export function solutionUrl(host: string, cardId: string): string {
  return `${host}/solution/${cardId}/`;
}

/**
 * Form fields for one payload variant. `all-options` guesses every option
 * and marks the request as a second attempt.
 */
export function buildSolutionForm(payload: SolutionPayload, options: readonly CardOption[]): FormFields {
  switch (payload) {
    case 'empty':
      return [['timer', '1']];
    case 'all-options':
      return [...options.map((option): [string, string] => ['guess[]', option.id]), ['timer', '2']];
    case 'freetext':
      return [
        ['guess', ''],
        ['timer', '1'],
      ];
  }
}

function looksLikeLogin(response: HttpResponse): boolean {
  return response.status === 401 || response.status === 403 || /\/login\b/.test(response.url);
}

/**
 * Classify a solution response.
 */
export function parseSolutionResponse(response: HttpResponse, payload: SolutionPayload): SolutionResult {
  if (looksLikeLogin(response)) {
    return { kind: 'auth', payload, status: response.status };
  }

  const text = responseText(response).trim();
  if (text.startsWith('<')) {
    return { kind: 'auth', payload, status: response.status };
  }
  if (response.status !== 200) {
    return { kind: 'invalid', payload, status: response.status, reason: `HTTP ${response.status}` };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { kind: 'invalid', payload, status: response.status, reason: 'body is not JSON' };
  }

  const parsed = SolutionSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: 'invalid', payload, status: response.status, reason: parsed.error.issues[0]?.message ?? 'bad shape' };
  }
  return { kind: 'solution', payload, solution: parsed.data };
}

// ============================================================================
// Requests
// ============================================================================

export async function postSolution(
  client: HttpClient,
  host: string,
  cardId: string,
  payload: SolutionPayload,
  options: readonly CardOption[]
): Promise<SolutionResult> {
  const response = await client.postForm(solutionUrl(host, cardId), buildSolutionForm(payload, options));
  const result = parseSolutionResponse(response, payload);
  if (result.kind !== 'solution') {
    logger.debug('Solution request did not return JSON', { cardId, payload, kind: result.kind, status: response.status });
  }
  return result;
}

/**
 * Fetch a solution the way the browser path does: the empty guess first,
 * then every option for multiple-choice cards.
 *
 * @throws SolutionError when no variant returns a solution
 */
export async function fetchSolution(
  client: HttpClient,
  host: string,
  cardId: string,
  options: readonly CardOption[],
  freetext: boolean
): Promise<Solution> {
  const payloads: SolutionPayload[] = freetext ? ['freetext'] : ['empty', 'all-options'];
  let last: SolutionResult | null = null;

  for (const payload of payloads) {
    last = await postSolution(client, host, cardId, payload, options);
    if (last.kind === 'solution') {
      return last.solution;
    }
  }

  throw new SolutionError(`No solution returned for card ${cardId}`, { cardId, lastKind: last?.kind });
}
