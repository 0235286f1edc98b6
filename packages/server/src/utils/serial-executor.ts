/**
 * Runs async tasks one at a time, in submission order.
 *
 * Each task starts only after the previous one settled. A failing task
 * rejects its own promise and does not stop the chain.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  /**
   * Resolves once every task submitted so far has settled.
   */
  idle(): Promise<void> {
    return this.tail;
  }

  /** Tasks submitted and not yet settled. */
  get size(): number {
    return this.pending;
  }
}
