/**
 * Concurrency Limiter Tests
 */

import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter } from '../../../../src/services/generation/limiter.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('ConcurrencyLimiter', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow('maxConcurrency must be a positive integer, got 1.5');
  });

  it('never runs more tasks than the limit', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;
    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => limiter.run(task)));
    expect(peak).toBe(2);
    expect(limiter.getStatus()).toEqual({ maxConcurrency: 2, active: 0, pending: 0 });
  });

  it('starts queued tasks in FIFO order', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const started: number[] = [];
    await Promise.all(
      [1, 2, 3].map((n) =>
        limiter.run(async () => {
          started.push(n);
          await delay(1);
        })
      )
    );
    expect(started).toEqual([1, 2, 3]);
  });

  it('settles every item in input order without letting one failure cancel the rest', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const results = await limiter.mapSettled([1, 2, 3], async (n) => {
      if (n === 2) throw new Error('item 2 failed');
      return n * 10;
    });

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected', 'fulfilled']);
    expect(results[0].status === 'fulfilled' && results[0].value).toBe(10);
    expect(results[2].status === 'fulfilled' && results[2].value).toBe(30);
  });

  it('releases its slot when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(await limiter.run(async () => 'next')).toBe('next');
  });
});
