/**
 * Single-writer queue. Tasks run one at a time in submission order; each
 * task's result or failure goes back to its own caller only.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task).finally(() => {
      this.pending -= 1;
    });
    // The failure is delivered through `result`; the chain itself must keep going.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Number of submitted tasks that have not settled yet. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled. */
  onIdle(): Promise<void> {
    return this.tail;
  }
}
