/**
 * Single-writer FIFO queue. Tasks run one at a time in submission order; a failing task
 * rejects only its own promise and the next task still runs.
 *
 * Every mutation from one signing account goes through one instance, so reading the
 * nonce, broadcasting and waiting for confirmation never interleave between two callers.
 */
export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Enqueues a task and resolves with its result once every earlier task has settled.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
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

  /** Resolves once every task enqueued so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }

  private settle(): void {
    this.pending--;
  }
}
