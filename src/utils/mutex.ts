/**
 * Promise-chain mutex: operations run one at a time in call order.
 * A failed operation releases the lock like a successful one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await operation();
    } finally {
      release();
    }
  }
}
