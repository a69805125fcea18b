/**
 * Async mutual exclusion.
 *
 * Callers queue on a promise chain; each `run()` callback starts only after
 * the previous one settled, so at most one holder runs at a time.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  /** Number of holders running or waiting */
  get size(): number {
    return this.pending;
  }
}
