/**
 * Single-writer queue: operations run one at a time in submission order.
 * A failing operation rejects its own promise and the queue moves on.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  enqueue<T>(operation: () => Promise<T> | T): Promise<T> {
    this.pending++;

    const run = this.tail.then(async () => {
      try {
        return await operation();
      } finally {
        this.pending--;
      }
    });

    // Keep the chain alive regardless of this operation's outcome
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  get size(): number {
    return this.pending;
  }
}
