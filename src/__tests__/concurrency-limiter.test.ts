import { describe, expect, it } from 'vitest';
import { ConcurrencyLimiter } from '../../app/src/concurrency-limiter.js';

describe('ConcurrencyLimiter', () => {
  it('should run tasks immediately when under limit', async () => {
    const limiter = new ConcurrencyLimiter(3);
    const result = await limiter.run(() => Promise.resolve(42));
    expect(result).toBe(42);
  });

  it('should return the task result', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const result = await limiter.run(() => Promise.resolve('hello'));
    expect(result).toBe('hello');
  });

  it('should propagate task errors', async () => {
    const limiter = new ConcurrencyLimiter(2);
    await expect(
      limiter.run(() => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');
  });

  it('should release slot after error so subsequent tasks can run', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(
      limiter.run(() => Promise.reject(new Error('fail'))),
    ).rejects.toThrow('fail');

    // Should still be able to run after error
    const result = await limiter.run(() => Promise.resolve('recovered'));
    expect(result).toBe('recovered');
  });

  it('should enforce concurrency limit', async () => {
    const limiter = new ConcurrencyLimiter(2);
    let maxConcurrent = 0;
    let currentConcurrent = 0;

    const makeTask = (delay: number) =>
      limiter.run(
        () =>
          new Promise<void>((resolve) => {
            currentConcurrent++;
            maxConcurrent = Math.max(maxConcurrent, currentConcurrent);
            setTimeout(() => {
              currentConcurrent--;
              resolve();
            }, delay);
          }),
      );

    await Promise.all([makeTask(50), makeTask(50), makeTask(50), makeTask(50)]);

    expect(maxConcurrent).toBe(2);
  });

  it('should queue tasks exceeding the limit', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: number[] = [];
    let resolveFirst: () => void = () => {};
    const firstBlocks = new Promise<void>((r) => {
      resolveFirst = r;
    });

    const task1 = limiter.run(async () => {
      order.push(1);
      await firstBlocks;
    });

    // task2 should be queued since limit is 1
    const task2Promise = limiter.run(async () => {
      order.push(2);
    });

    // Give microtasks a chance to settle
    await new Promise((r) => setTimeout(r, 10));

    expect(limiter.active).toBe(1);
    expect(limiter.pending).toBe(1);
    expect(order).toEqual([1]);

    // Release first task
    resolveFirst();
    await task1;
    await task2Promise;

    expect(order).toEqual([1, 2]);
    expect(limiter.active).toBe(0);
    expect(limiter.pending).toBe(0);
  });

  it('should report active and pending counts', async () => {
    const limiter = new ConcurrencyLimiter(1);

    expect(limiter.active).toBe(0);
    expect(limiter.pending).toBe(0);

    let resolveTask: () => void = () => {};
    const taskBlocks = new Promise<void>((r) => {
      resolveTask = r;
    });

    const running = limiter.run(() => taskBlocks);
    await new Promise((r) => setTimeout(r, 0));

    expect(limiter.active).toBe(1);

    // Queue another
    const queued = limiter.run(() => Promise.resolve());
    await new Promise((r) => setTimeout(r, 0));

    expect(limiter.pending).toBe(1);

    resolveTask();
    await running;
    await queued;

    expect(limiter.active).toBe(0);
    expect(limiter.pending).toBe(0);
  });

  it('should handle concurrency of 1 as sequential execution', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];

    await Promise.all([
      limiter.run(async () => {
        order.push('a-start');
        await new Promise((r) => setTimeout(r, 20));
        order.push('a-end');
      }),
      limiter.run(async () => {
        order.push('b-start');
        await new Promise((r) => setTimeout(r, 10));
        order.push('b-end');
      }),
    ]);

    expect(order).toEqual(['a-start', 'a-end', 'b-start', 'b-end']);
  });

  it('should reject a non-positive or fractional limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow('maxConcurrency must be a positive integer, got 0');
    expect(() => new ConcurrencyLimiter(1.5)).toThrow('got 1.5');
  });

  it('should hand a freed slot to the queued task before a newcomer', async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];
    let releaseFirst: () => void = () => {};

    const first = limiter.run(
      () =>
        new Promise<void>((resolve) => {
          releaseFirst = resolve;
        }),
    );
    const queued = limiter.run(async () => {
      order.push('queued');
    });
    await new Promise((r) => setTimeout(r, 0));

    releaseFirst();
    const newcomer = limiter.run(async () => {
      order.push('newcomer');
    });
    await Promise.all([first, queued, newcomer]);

    expect(order).toEqual(['queued', 'newcomer']);
  });

  describe('map', () => {
    it('should keep input order regardless of completion order', async () => {
      const limiter = new ConcurrencyLimiter(2);
      const result = await limiter.map([30, 5, 15], async (delay) => {
        await new Promise((r) => setTimeout(r, delay));
        return delay * 2;
      });
      expect(result).toEqual([60, 10, 30]);
    });

    it('should never exceed the limit', async () => {
      const limiter = new ConcurrencyLimiter(2);
      let current = 0;
      let peak = 0;
      await limiter.map([1, 2, 3, 4, 5], async () => {
        current++;
        peak = Math.max(peak, current);
        await new Promise((r) => setTimeout(r, 10));
        current--;
      });
      expect(peak).toBe(2);
    });
  });
});
