/**
 * Bounded single-consumer queue between a producer task and an async
 * iterator. `push` waits while the buffer is full, so a slow consumer slows
 * the producer down. Closing with an error rejects the consumer once the
 * buffered items are drained; cancelling discards everything.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private closed = false;
  private cancelled = false;
  private failure?: { error: unknown };
  private readers: Array<() => void> = [];
  private writers: Array<() => void> = [];

  constructor(private readonly capacity = 16) {
    if (!(capacity >= 1)) throw new RangeError("Channel capacity must be at least 1");
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Resolves false when the channel was closed or cancelled before the item could be queued. */
  async push(item: T): Promise<boolean> {
    while (!this.closed && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.writers.push(resolve));
    }
    if (this.closed) return false;
    this.buffer.push(item);
    this.wake(this.readers);
    return true;
  }

  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };
    this.wake(this.readers);
    this.wake(this.writers);
  }

  cancel(): void {
    this.cancelled = true;
    this.buffer = [];
    this.failure = undefined;
    this.closed = true;
    this.wake(this.readers);
    this.wake(this.writers);
  }

  /** Resolves once an item is buffered or the channel is closed. Never rejects. */
  async ready(): Promise<void> {
    while (this.buffer.length === 0 && !this.closed) {
      await new Promise<void>((resolve) => this.readers.push(resolve));
    }
  }

  /** The close error, if the channel failed without delivering anything still buffered. */
  pendingError(): { error: unknown } | undefined {
    return this.buffer.length === 0 ? this.failure : undefined;
  }

  async next(): Promise<IteratorResult<T, undefined>> {
    while (true) {
      if (this.buffer.length > 0) {
        const [value, ...rest] = this.buffer;
        this.buffer = rest;
        this.wake(this.writers);
        return { value, done: false };
      }
      if (this.closed) {
        const failure = this.failure;
        this.failure = undefined;
        if (failure) throw failure.error;
        return { value: undefined, done: true };
      }
      await new Promise<void>((resolve) => this.readers.push(resolve));
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      }
    };
  }

  private wake(waiters: Array<() => void>): void {
    const pending = waiters.splice(0, waiters.length);
    for (const resolve of pending) resolve();
  }
}
