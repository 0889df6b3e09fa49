/**
 * Runs async tasks strictly one after another, in submission order.
 * Used in stdio mode so tool calls never overlap.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    // The caller observes failures through `result`; the chain only tracks completion
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

  /** Tasks queued or running */
  get size(): number {
    return this.pending;
  }
}
