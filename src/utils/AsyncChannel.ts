interface PendingRead<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Bounded single-consumer channel.
 *
 * The producer awaits `push` (which waits while the buffer is full) and ends
 * with `close` or `fail`. The consumer iterates with `for await`; leaving the
 * loop early calls `return`, which closes the channel from the consumer side
 * and runs `onCancel` so the producer can release its resources.
 */
export class AsyncChannel<T> implements AsyncIterableIterator<T> {
  private buffer: Array<{ value: T }> = [];
  private readers: PendingRead<T>[] = [];
  private writers: Array<() => void> = [];
  private closed = false;
  private cancelled = false;
  private failure: { error: unknown } | null = null;

  constructor(
    private readonly capacity: number = 16,
    private readonly onCancel?: () => void
  ) {
    if (capacity < 1) {
      throw new RangeError('Channel capacity must be at least 1');
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Deliver an item. Resolves false when the channel is closed and the item
   * was dropped; the producer should stop.
   */
  async push(item: T): Promise<boolean> {
    while (!this.closed && this.readers.length === 0 && this.buffer.length >= this.capacity) {
      await new Promise<void>((resolve) => this.writers.push(resolve));
    }
    if (this.closed) {
      return false;
    }

    const reader = this.readers.shift();
    if (reader) {
      reader.resolve({ value: item, done: false });
    } else {
      this.buffer.push({ value: item });
    }
    return true;
  }

  /** Producer finished; buffered items are still delivered */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.settleReaders();
    this.wakeWriters();
  }

  /** Producer failed; buffered items are delivered, then the error */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    this.settleReaders();
    this.wakeWriters();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const entry = this.buffer.shift();
    if (entry) {
      this.writers.shift()?.();
      return Promise.resolve({ value: entry.value, done: false });
    }
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => this.readers.push({ resolve, reject }));
  }

  /** Consumer stops early; pending and buffered items are dropped */
  cancel(): void {
    if (!this.closed) {
      this.cancelled = true;
      this.buffer = [];
      this.close();
      this.onCancel?.();
    }
    this.failure = null;
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.cancel();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private settleReaders(): void {
    // Readers only wait on an empty buffer
    const readers = this.readers;
    this.readers = [];
    for (const reader of readers) {
      if (this.failure) {
        const { error } = this.failure;
        this.failure = null;
        reader.reject(error);
      } else {
        reader.resolve({ value: undefined, done: true });
      }
    }
  }

  private wakeWriters(): void {
    const writers = this.writers;
    this.writers = [];
    writers.forEach((wake) => wake());
  }
}
