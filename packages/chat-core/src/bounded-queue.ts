/**
 * FIFO queue with a fixed capacity. Producers await `push` until the consumer has
 * made room, so a slow reader slows every writer instead of growing memory.
 */
export class BoundedAsyncQueue<T> implements AsyncIterable<T> {
  private values: Array<{ readonly value: T }> = [];
  private readers: Array<(value: IteratorResult<T>) => void> = [];
  private writers: Array<(open: boolean) => void> = [];
  private closed = false;

  public constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`queue capacity must be a positive integer: ${String(capacity)}`);
    }
  }

  public get size(): number {
    return this.values.length;
  }

  public get pendingWriters(): number {
    return this.writers.length;
  }

  public isClosed(): boolean {
    return this.closed;
  }

  /** Resolves `true` once the value is enqueued, `false` if the queue closed first. */
  public async push(value: T): Promise<boolean> {
    while (!this.closed) {
      if (this.offer(value)) {
        return true;
      }
      const open = await new Promise<boolean>((resolve) => {
        this.writers.push(resolve);
      });
      if (!open) {
        return false;
      }
    }
    return false;
  }

  public offer(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const reader = this.readers.shift();
    if (reader !== undefined) {
      reader({ done: false, value });
      return true;
    }
    if (this.values.length >= this.capacity) {
      return false;
    }
    this.values.push({ value });
    return true;
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.values = [];
    for (const reader of this.readers.splice(0)) {
      reader({ done: true, value: undefined });
    }
    for (const writer of this.writers.splice(0)) {
      writer(false);
    }
  }

  public async next(): Promise<IteratorResult<T>> {
    const entry = this.values.shift();
    if (entry !== undefined) {
      this.writers.shift()?.(true);
      return { done: false, value: entry.value };
    }
    if (this.closed) {
      return { done: true, value: undefined };
    }
    return await new Promise<IteratorResult<T>>((resolve) => {
      this.readers.push(resolve);
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: async () => await this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}
