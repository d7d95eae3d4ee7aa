/**
 * Single serial worker: tasks run one at a time in submission order.
 *
 * Each storage provider and search service owns one of these, which is what
 * makes an instance safe to share between concurrent callers.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue a task. The returned promise settles with the task's outcome;
   * a failed task does not stop the tasks queued after it.
   */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Number of tasks queued or running. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task queued so far has settled. */
  drain(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
