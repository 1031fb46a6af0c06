/**
 * Bounded concurrency for blocking work (generation calls, focal-node passes).
 * Tasks beyond the limit wait in FIFO order.
 */

export interface LimiterStatus {
  maxConcurrency: number;
  active: number;
  pending: number;
}

export class ConcurrencyLimiter {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Run `worker` over every item with this limiter and keep the input order
   * in the result. Rejections are returned as settled results, never thrown,
   * so one failing item cannot cancel its siblings.
   */
  async mapSettled<I, O>(items: readonly I[], worker: (item: I, index: number) => Promise<O>): Promise<PromiseSettledResult<O>[]> {
    return Promise.allSettled(items.map((item, index) => this.run(() => worker(item, index))));
  }

  getStatus(): LimiterStatus {
    return { maxConcurrency: this.maxConcurrency, active: this.active, pending: this.queue.length };
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrency) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push(() => {
        this.active++;
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.queue.shift();
    if (next) next();
  }
}
