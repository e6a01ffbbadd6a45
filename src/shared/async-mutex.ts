/**
 * Promise-chain mutual exclusion for serializing async operations inside a
 * single Node.js process. Waiters run in FIFO order.
 */
export class AsyncMutex {
  #queue: Promise<void> = Promise.resolve();

  /** Execute `fn` while holding the mutex. */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.#queue;
    this.#queue = gate;

    await previous;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
