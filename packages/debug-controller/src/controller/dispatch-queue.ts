/**
 * Runs work items strictly one at a time, in submission order.
 *
 * A failing item rejects its own promise only; the items behind it still run.
 */
export class DispatchQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  public enqueue<T>(work: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const run = async (): Promise<T> => {
      try {
        return await work();
      } finally {
        this.pending--;
      }
    };
    const next = this.tail.then(run, run);
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  /** Resolves once every item submitted so far has settled. */
  public drain(): Promise<void> {
    return this.tail.then(() => undefined);
  }

  public get size(): number {
    return this.pending;
  }
}
