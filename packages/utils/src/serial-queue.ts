/**
 * Serial queue
 *
 * Runs submitted tasks one at a time in submission order. A rejected task
 * does not stall the queue; its rejection goes to its own caller.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Number of tasks submitted and not yet settled
   */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return result;
  }

  /**
   * Resolves once every task submitted so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}
