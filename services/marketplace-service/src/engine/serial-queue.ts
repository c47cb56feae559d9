/**
 * Runs tasks one at a time in submission order. A task starts only after the
 * previous one has settled, whichever way it settled.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    // The caller observes the outcome through `result`; the tail only orders tasks.
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
