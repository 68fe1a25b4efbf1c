/**
 * Per-key mutual exclusion.
 *
 * Tasks for the same key run one at a time in arrival order; tasks for
 * different keys never wait on each other. Each key holds only the tail of
 * its promise chain, dropped once the chain drains.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  get activeKeys(): number {
    return this.tails.size;
  }
}
