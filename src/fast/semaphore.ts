/**
 * Concurrency primitives for the fast path.
 */

/**
 * Counting semaphore. Waiters are admitted in arrival order.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Semaphore size must be a positive integer, got ${size}`);
    }
    this.available = size;
  }

  /** Permits currently free */
  get free(): number {
    return this.available;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else {
      this.available++;
    }
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Mutual exclusion with a promise chain. Each caller waits for the previous
 * holder to finish before its own function runs.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Resolves once every queued holder has finished. */
  async idle(): Promise<void> {
    let tail: Promise<void>;
    do {
      tail = this.tail;
      await tail;
    } while (tail !== this.tail);
  }
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 *
 * Results come back in completion order. A rejected call is reported as a
 * rejected settlement and never stops its siblings.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const settled: PromiseSettledResult<R>[] = [];
  const pending = new Set<Promise<void>>();

  for (let index = 0; index < items.length; index++) {
    while (pending.size >= concurrency) {
      await Promise.race(pending);
    }

    const item = items[index];
    const promise: Promise<void> = fn(item, index)
      .then(
        (value) => {
          settled.push({ status: 'fulfilled', value });
        },
        (reason: unknown) => {
          settled.push({ status: 'rejected', reason });
        }
      )
      .finally(() => {
        pending.delete(promise);
      });
    pending.add(promise);
  }

  await Promise.all(pending);
  return settled;
}
