/**
 * Promise-chain mutex. Operations run one at a time, in the order
 * `run` was called.
 */
export class ExclusiveQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  get pending(): number {
    return this.waiting;
  }

  async run<T>(operation: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release!: () => void;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    this.waiting++;
    await previous;
    try {
      return await operation();
    } finally {
      this.waiting--;
      release();
    }
  }
}
