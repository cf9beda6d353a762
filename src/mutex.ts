/**
 * Promise-chained mutual exclusion. Callers run strictly one after another in
 * the order they called `runExclusive`; a rejected task does not block the
 * ones queued behind it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.release(),
      () => this.release(),
    );
    return run;
  }

  private release(): void {
    this.pending--;
  }
}

/**
 * One {@link Mutex} per key, created on demand and dropped once idle.
 */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }
    try {
      return await lock.runExclusive(task);
    } finally {
      if (!lock.isLocked) {
        this.locks.delete(key);
      }
    }
  }
}
