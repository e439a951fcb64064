/**
 * Concurrency limiter for async operations.
 *
 * @module utils/concurrency
 */

/**
 * Runs at most `limit` async operations at once. Waiters are admitted in the
 * order they called `run`.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(1);
 * // Never overlap, even when called concurrently
 * await Promise.all(names.map((name) => limiter.run(() => client.call(name))));
 * ```
 */
export class ConcurrencyLimiter {
  private running = 0;
  private readonly queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations
   */
  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('Concurrency limit must be a positive integer');
    }
  }

  /**
   * Run `fn` once a slot is free.
   *
   * @returns Whatever `fn` resolves to; its rejection propagates unchanged
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.running < this.limit) {
      this.running++;
    } else {
      // The slot is handed over directly by the finishing operation
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }

    try {
      return await fn();
    } finally {
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.running--;
      }
    }
  }

  getRunningCount(): number {
    return this.running;
  }

  getQueueSize(): number {
    return this.queue.length;
  }
}
