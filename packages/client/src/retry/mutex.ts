/**
 * FIFO async mutex. Callers acquire in call order; a failing holder still
 * releases.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** Whether a task holds or waits for the lock. */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => released);
    this.holders++;

    await previous;
    try {
      return await task();
    } finally {
      this.holders--;
      release();
    }
  }
}
