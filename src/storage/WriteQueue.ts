/**
 * Write Queue
 * Runs read-modify-write sections one at a time per store.
 */

export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` after every previously queued section has settled.
   * A failing section rejects its own caller only.
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Resolves once everything queued so far has settled */
  async drain(): Promise<void> {
    await this.tail;
  }
}
