/**
 * Result of taking from an {@link AsyncQueue}.
 */
export type TakeResult<T> = { done: false; value: T } | { done: true };

/**
 * Unbounded FIFO queue with an awaitable `take`.
 *
 * Enqueueing never waits. `take` waits while the queue is empty; closing
 * the queue releases every waiting taker with `{ done: true }`.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(result: TakeResult<T>) => void> = [];
  private closed = false;
  private unacknowledged = 0;

  /** Number of queued items. */
  get size(): number {
    return this.items.length;
  }

  /** Items enqueued and not yet acknowledged by the consumer. */
  get unfinished(): number {
    return this.unacknowledged;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Appends an item, handing it straight to a waiting taker if there is one.
   * Items offered after close stay queued but are never taken.
   */
  enqueue(item: T): void {
    this.unacknowledged++;
    const taker = this.closed ? undefined : this.takers.shift();
    if (taker) {
      taker({ done: false, value: item });
      return;
    }
    this.items.push(item);
  }

  /**
   * Takes the oldest item, waiting while the queue is empty.
   */
  take(): Promise<TakeResult<T>> {
    if (this.closed) {
      return Promise.resolve({ done: true });
    }
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ done: false, value });
    }
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  /**
   * Marks one taken item as fully handled.
   */
  acknowledge(): void {
    if (this.unacknowledged > 0) {
      this.unacknowledged--;
    }
  }

  /**
   * Closes the queue and releases waiting takers.
   */
  close(): void {
    this.closed = true;
    for (const taker of this.takers.splice(0)) {
      taker({ done: true });
    }
  }
}
