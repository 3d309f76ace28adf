/**
 * Single-writer serialization point.
 *
 * Every mutating ledger operation runs through one shared Serializer, so
 * operations are applied one at a time in submission order and the events
 * they publish appear in commit order. A rejected task does not stall the
 * ones queued behind it.
 *
 * @module utils/serializer
 */

export class Serializer {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  /**
   * Queue `task` behind every previously submitted task and resolve with its
   * result once it has run.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Number of tasks submitted but not yet settled. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once everything submitted so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
