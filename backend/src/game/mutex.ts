/**
 * Promise-chained mutual exclusion. Tasks run one at a time in the order they
 * asked for the lock; a task that throws still releases it.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get locked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending += 1;

    await previous;
    try {
      return await task();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
