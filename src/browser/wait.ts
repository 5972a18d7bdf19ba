/**
 * Condition polling.
 *
 * Pages on the cards site settle at unpredictable speeds. Rather than sleep
 * a fixed time after a navigation or click, callers poll for the condition
 * they are about to rely on.
 */

import type { BrowserSession } from './browser_session';

export interface WaitOptions {
  /** Give up after this many milliseconds */
  timeoutMs?: number;
  /** Delay between polls */
  intervalMs?: number;
}

export const DEFAULT_WAIT_TIMEOUT_MS = 10000;
export const DEFAULT_WAIT_INTERVAL_MS = 250;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll `predicate` until it returns true or the timeout elapses.
 *
 * The predicate is always evaluated at least once, and once more at the
 * deadline. A predicate that throws counts as false for that poll.
 *
 * @returns true if the condition was met, false on timeout
 */
export async function waitUntil(
  predicate: () => boolean | Promise<boolean>,
  options: WaitOptions = {}
): Promise<boolean> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
  const intervalMs = options.intervalMs ?? DEFAULT_WAIT_INTERVAL_MS;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    if (await safely(predicate)) {
      return true;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return false;
    }
    await sleep(Math.min(intervalMs, remaining));
  }
}

async function safely(predicate: () => boolean | Promise<boolean>): Promise<boolean> {
  try {
    return await predicate();
  } catch {
    // A page mid-navigation can reject queries; try again on the next poll.
    return false;
  }
}

/**
 * Wait until any of the selectors matches on the current page.
 */
export function waitForAnySelector(
  session: BrowserSession,
  selectors: string[],
  options: WaitOptions = {}
): Promise<boolean> {
  return waitUntil(async () => {
    for (const selector of selectors) {
      if (await session.exists(selector)) {
        return true;
      }
    }
    return false;
  }, options);
}
