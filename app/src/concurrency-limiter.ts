/**
 * Promise-queue semaphore. With a limit of 1 it doubles as a single-writer
 * queue.
 */
export class ConcurrencyLimiter {
  private running = 0;
  private queue: (() => void)[] = [];

  constructor(private readonly maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new Error(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.running >= this.maxConcurrency) {
      // The finishing task hands its slot over without releasing it
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.running++;
    }
    try {
      return await task();
    } finally {
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.running--;
      }
    }
  }

  /** Apply `fn` to every item under the limit; results keep input order. */
  map<I, O>(items: readonly I[], fn: (item: I) => Promise<O>): Promise<O[]> {
    return Promise.all(items.map((item) => this.run(() => fn(item))));
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }
}
