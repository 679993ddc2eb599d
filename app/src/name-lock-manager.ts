/**
 * Per-plugin serialization of lifecycle mutations.
 */

/**
 * Queues tasks per plugin name so that no two mutating operations on the
 * same plugin overlap. Tasks for different names never wait on each other.
 *
 * Entries are dropped once a name's queue drains.
 */
export class NameLockManager {
  private tails: Map<string, Promise<void>> = new Map();
  private queued: Map<string, number> = new Map();

  /** Run `task` once every earlier task for `name` has settled. */
  async withLock<T>(name: string, task: () => Promise<T>): Promise<T> {
    this.queued.set(name, (this.queued.get(name) ?? 0) + 1);

    const previous = this.tails.get(name) ?? Promise.resolve();
    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tails.set(
      name,
      previous.then(() => done),
    );

    await previous;

    try {
      return await task();
    } finally {
      const remaining = (this.queued.get(name) ?? 1) - 1;
      if (remaining <= 0) {
        this.queued.delete(name);
        this.tails.delete(name);
      } else {
        this.queued.set(name, remaining);
      }
      release();
    }
  }

  /** True while a task for `name` is running or waiting */
  isBusy(name: string): boolean {
    return (this.queued.get(name) ?? 0) > 0;
  }
}
