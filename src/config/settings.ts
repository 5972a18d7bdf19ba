/**
 * Runtime settings parsed from environment variables.
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../errors';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_HOST = 'https://cards.ucalgary.ca';

/** Credentials file shared with earlier releases of the exporter */
export const DEFAULT_CONFIG_FILENAME = '.uc_anki_config.json';

// ============================================================================
// Schema
// ============================================================================

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    blankToUndefined,
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .optional()
      .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1' || value === 'yes'))
  );

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  CARDS_BASE_URL: optionalString,
  CARDS_BAG_ID: optionalString,
  CARDS_EMAIL: optionalString,
  CARDS_PASSWORD: optionalString,
  CARDS_CONFIG_PATH: optionalString,
  CARDS_HEADLESS: booleanFlag(true),
  CARDS_FAST: booleanFlag(true),
  CARDS_CONCURRENCY: positiveInt(10),
  CARDS_MAX_CONNECTIONS: positiveInt(20),
  CARDS_NAV_TIMEOUT_MS: positiveInt(30000),
  CARDS_CLASSIFIER_KEYWORDS: optionalString,
});

// ============================================================================
// Types
// ============================================================================

export interface Settings {
  /** Scheme and host of the cards site, no trailing slash */
  host: string;
  /** bag_id used when a deck URL carries none */
  defaultBagId?: string;
  /** Deck details URL taken from CARDS_BASE_URL, when it points at one */
  defaultTargetUrl?: string;
  email?: string;
  password?: string;
  /** Location of the saved credentials file */
  configPath: string;
  headless: boolean;
  /** Use the concurrent HTTP path for card extraction */
  fastPath: boolean;
  /** Card fetches in flight at once on the fast path */
  concurrency: number;
  /** Upper bound on open HTTP sockets */
  maxConnections: number;
  navigationTimeoutMs: number;
  /** Replacement classifier keyword table */
  classifierKeywordsPath?: string;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse settings from an environment map.
 *
 * CARDS_BASE_URL may be a bare host or a full deck URL; its origin becomes
 * the host, its bag_id query value the default bag, and a /details/ path the
 * default target. CARDS_BAG_ID wins over the embedded bag_id.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }

  const vars = parsed.data;
  let host = DEFAULT_HOST;
  let embeddedBagId: string | undefined;
  let defaultTargetUrl: string | undefined;

  if (vars.CARDS_BASE_URL) {
    let baseUrl: URL;
    try {
      baseUrl = new URL(vars.CARDS_BASE_URL);
    } catch {
      throw new ConfigError(`CARDS_BASE_URL is not a valid URL: ${vars.CARDS_BASE_URL}`);
    }
    host = baseUrl.origin;
    embeddedBagId = baseUrl.searchParams.get('bag_id') ?? undefined;
    if (baseUrl.pathname.includes('/details/')) {
      defaultTargetUrl = vars.CARDS_BASE_URL;
    }
  }

  return {
    host,
    defaultBagId: vars.CARDS_BAG_ID ?? embeddedBagId,
    defaultTargetUrl,
    email: vars.CARDS_EMAIL,
    password: vars.CARDS_PASSWORD,
    configPath: vars.CARDS_CONFIG_PATH ?? join(homedir(), DEFAULT_CONFIG_FILENAME),
    headless: vars.CARDS_HEADLESS,
    fastPath: vars.CARDS_FAST,
    concurrency: vars.CARDS_CONCURRENCY,
    maxConnections: vars.CARDS_MAX_CONNECTIONS,
    navigationTimeoutMs: vars.CARDS_NAV_TIMEOUT_MS,
    classifierKeywordsPath: vars.CARDS_CLASSIFIER_KEYWORDS,
  };
}
