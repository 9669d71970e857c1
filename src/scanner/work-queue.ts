type Taker<T> = (item: T | undefined) => void;

/**
 * Unbounded FIFO shared by the scan workers.
 *
 * Every `put` raises the unfinished count and every `taskDone` lowers it;
 * `join` resolves once it is back at zero. `close` wakes idle takers with
 * `undefined` and drops whatever is still pending, counting it as done.
 */
export class WorkQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Taker<T>[] = [];
  private readonly joiners: Array<() => void> = [];
  private unfinished = 0;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get pending(): number {
    return this.unfinished;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(item: T): void {
    if (this.closed) {
      throw new Error('Cannot put into a closed queue');
    }

    this.unfinished++;
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Resolves with the next item, waiting while the queue is empty.
   * Resolves with undefined once the queue is closed.
   */
  take(): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.takers.push(resolve);
    });
  }

  taskDone(): void {
    if (this.unfinished <= 0) {
      throw new Error('taskDone() called more times than there were items');
    }

    this.unfinished--;
    if (this.unfinished === 0) {
      this.releaseJoiners();
    }
  }

  join(): Promise<void> {
    if (this.unfinished === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.joiners.push(resolve);
    });
  }

  /** Returns the number of pending items that were dropped. */
  close(): number {
    if (this.closed) return 0;
    this.closed = true;

    const dropped = this.items.splice(0, this.items.length).length;
    this.unfinished -= dropped;

    for (const taker of this.takers.splice(0, this.takers.length)) {
      taker(undefined);
    }

    if (this.unfinished === 0) {
      this.releaseJoiners();
    }

    return dropped;
  }

  private releaseJoiners(): void {
    for (const resolve of this.joiners.splice(0, this.joiners.length)) {
      resolve();
    }
  }
}
