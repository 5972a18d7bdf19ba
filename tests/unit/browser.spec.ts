import { test, expect } from '@playwright/test';
import { waitForAnySelector, waitUntil } from '../../src/browser/wait';
import { FakeSite, TEST_HOST } from '../support/fake_site';

test.describe('Waiting for slow pages', () => {
  test('a condition that turns true late is still seen', async () => {
    const readyAt = Date.now() + 60;
    let polls = 0;

    const met = await waitUntil(
      () => {
        polls++;
        return Date.now() >= readyAt;
      },
      { timeoutMs: 2000, intervalMs: 10 }
    );

    expect(met).toBe(true);
    expect(Date.now()).toBeGreaterThanOrEqual(readyAt);
    expect(polls).toBeGreaterThan(1);
  });

  test('a predicate that throws is polled again', async () => {
    let calls = 0;
    const met = await waitUntil(
      () => {
        calls++;
        if (calls < 3) {
          throw new Error('Execution context was destroyed');
        }
        return true;
      },
      { timeoutMs: 2000, intervalMs: 5 }
    );

    expect(met).toBe(true);
    expect(calls).toBe(3);
  });

  test('gives up at the deadline', async () => {
    const started = Date.now();
    expect(await waitUntil(() => false, { timeoutMs: 50, intervalMs: 10 })).toBe(false);
    expect(Date.now() - started).toBeGreaterThanOrEqual(50);
  });

  test('a selector on a page that arrives late is found', async () => {
    const site = new FakeSite({
      '/card/1': { html: '<html><body><div id="workspace"><h3>Which lead shows the change?</h3></div></body></html>' },
    });
    const timer = setTimeout(() => site.landOn('/card/1'), 40);

    try {
      expect(await waitForAnySelector(site, ['#missing', '#workspace h3'], { timeoutMs: 2000, intervalMs: 10 })).toBe(true);
    } finally {
      clearTimeout(timer);
    }
    expect(site.currentUrl()).toBe(`${TEST_HOST}/card/1`);
  });

  test('a selector that never appears times out', async () => {
    const site = new FakeSite();
    expect(await waitForAnySelector(site, ['#workspace'], { timeoutMs: 50, intervalMs: 10 })).toBe(false);
  });
});
