/**
 * Promise-chained mutual exclusion. Callers queue in arrival order.
 */
export class PairingLock {
  private tail: Promise<void> = Promise.resolve();

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}
