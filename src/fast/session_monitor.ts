/**
 * Session freshness for the fast path.
 *
 * The HTTP client rides on cookies copied from the browser login. They are
 * refreshed when they get old, or once enough requests made with them have
 * come back looking logged out. Every refresh bumps a generation counter:
 * failures reported against an older generation were sent with cookies that
 * have already been replaced and do not count.
 */

import { getLogger } from '../logging/logger';
import { Mutex } from './semaphore';

const logger = getLogger('session-monitor');

export const DEFAULT_SESSION_MAX_AGE_MS = 25 * 60 * 1000;
export const DEFAULT_AUTH_FAILURE_THRESHOLD = 3;

/** Logs in again and reloads the HTTP client's cookies */
export type Reauthenticate = () => Promise<void>;

export interface SessionMonitorOptions {
  sessionMaxAgeMs?: number;
  /** Consecutive auth-looking failures before a refresh */
  authFailureThreshold?: number;
  now?: () => number;
}

export class SessionMonitor {
  private readonly mutex = new Mutex();
  private readonly maxAgeMs: number;
  private readonly threshold: number;
  private readonly now: () => number;
  private authenticatedAt: number;
  private failures = 0;
  private currentGeneration = 0;
  private refreshes = 0;

  constructor(
    private readonly reauthenticate: Reauthenticate,
    options: SessionMonitorOptions = {}
  ) {
    this.maxAgeMs = options.sessionMaxAgeMs ?? DEFAULT_SESSION_MAX_AGE_MS;
    this.threshold = options.authFailureThreshold ?? DEFAULT_AUTH_FAILURE_THRESHOLD;
    this.now = options.now ?? Date.now;
    this.authenticatedAt = this.now();
  }

  /** Bumped by every completed refresh */
  get generation(): number {
    return this.currentGeneration;
  }

  get refreshCount(): number {
    return this.refreshes;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  isStale(): boolean {
    return this.now() - this.authenticatedAt >= this.maxAgeMs;
  }

  /**
   * Call before a request. Refreshes a stale session and waits out any
   * refresh already running.
   *
   * @returns the generation the request will be sent with
   */
  async ensureFresh(): Promise<number> {
    if (this.isStale()) {
      await this.refresh(this.currentGeneration, 'session age');
    } else {
      await this.mutex.idle();
    }
    return this.currentGeneration;
  }

  recordSuccess(generation: number): void {
    if (generation === this.currentGeneration) {
      this.failures = 0;
    }
  }

  /**
   * Count an auth-looking response and refresh once the threshold is hit.
   */
  async reportAuthFailure(generation: number): Promise<void> {
    if (generation !== this.currentGeneration) {
      await this.mutex.idle();
      return;
    }
    this.failures++;
    logger.debug('Auth-looking response', { failures: this.failures, threshold: this.threshold });
    if (this.failures >= this.threshold) {
      await this.refresh(generation, 'auth failures');
    }
  }

  /**
   * Refresh the session unless a refresh newer than `generation` has already
   * completed. Concurrent callers share a single refresh.
   */
  async refresh(generation: number, reason: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (generation !== this.currentGeneration) {
        return;
      }
      logger.info('Refreshing session', { reason, generation });
      await this.reauthenticate();
      this.currentGeneration++;
      this.refreshes++;
      this.failures = 0;
      this.authenticatedAt = this.now();
    });
  }
}
