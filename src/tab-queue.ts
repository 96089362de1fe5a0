// tab-queue.ts — Per-key FIFO serialization
// Work queued under one key runs one at a time in enqueue order; distinct keys
// run independently. The enqueue itself is synchronous, so arrival order is
// the order of run() calls.

export type QueueKey = string | number;

export class TabQueue {
  private tails = new Map<QueueKey, Promise<void>>();
  private depths = new Map<QueueKey, number>();

  run<T>(key: QueueKey, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    // A failed predecessor belongs to its own caller; the lane moves on.
    const result = previous.then(fn, fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    this.depths.set(key, (this.depths.get(key) ?? 0) + 1);

    void tail.then(() => {
      const depth = (this.depths.get(key) ?? 1) - 1;
      if (depth > 0) {
        this.depths.set(key, depth);
        return;
      }
      this.depths.delete(key);
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return result;
  }

  /** Number of queued or running jobs for a key. */
  depth(key: QueueKey): number {
    return this.depths.get(key) ?? 0;
  }

  /** Keys with work queued or running. */
  activeKeys(): QueueKey[] {
    return [...this.depths.keys()];
  }

  /** Resolves once every job queued so far has settled. */
  async idle(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }
}
