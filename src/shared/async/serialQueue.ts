/**
 * Runs async tasks one at a time in submission order.
 * A failed task does not block the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  public get size(): number {
    return this.pending;
  }

  public run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.release(),
      () => this.release(),
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  public drain(): Promise<void> {
    return this.tail;
  }

  private release(): void {
    this.pending -= 1;
  }
}
