/**
 * Error taxonomy for the scraper.
 *
 * Callers branch on the concrete class: an AuthError means the credentials
 * must be re-prompted, a NavigationError means the target URL must be
 * re-prompted while the credentials are kept.
 */

export type CardsErrorCode =
  | 'AUTH_FAILED'
  | 'NAVIGATION_FAILED'
  | 'DISCOVERY_FAILED'
  | 'EXTRACTION_FAILED'
  | 'SOLUTION_FAILED'
  | 'CONFIG_INVALID';

export class CardsError extends Error {
  readonly code: CardsErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CardsErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Login form unreachable or the logged-in marker missing after submit. */
export class AuthError extends CardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('AUTH_FAILED', message, details);
  }
}

/** Wrong domain, error page, blank page or a URL without a deck/collection path. */
export class NavigationError extends CardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NAVIGATION_FAILED', message, details);
  }
}

/** Every discovery strategy came back empty for a deck. */
export class DiscoveryError extends CardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DISCOVERY_FAILED', message, details);
  }
}

export class ExtractionError extends CardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('EXTRACTION_FAILED', message, details);
  }
}

export class SolutionError extends CardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SOLUTION_FAILED', message, details);
  }
}

export class ConfigError extends CardsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
