// src/utils/channel.ts

/**
 * Single-consumer async queue with a fixed capacity. `send` waits while the
 * buffer is full and resolves `false` once the channel is closed or its
 * signal aborts. Breaking out of a `for await` loop closes the channel and
 * releases waiting senders.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private closed = false;
  private receivers: Array<(result: IteratorResult<T>) => void> = [];
  private senders: Array<(accepted: boolean) => void> = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(value: T, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      if (this.closed || signal?.aborted) {
        return false;
      }
      const receiver = this.receivers.shift();
      if (receiver) {
        receiver({ value, done: false });
        return true;
      }
      if (this.buffer.length < this.capacity) {
        this.buffer.push(value);
        return true;
      }
      const hasSpace = await this.waitForSpace(signal);
      if (!hasSpace) {
        return false;
      }
    }
  }

  private waitForSpace(signal?: AbortSignal): Promise<boolean> {
    return new Promise<boolean>(resolve => {
      const onAbort = (): void => {
        this.senders = this.senders.filter(sender => sender !== wake);
        resolve(false);
      };
      const wake = (hasSpace: boolean): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve(hasSpace);
      };
      this.senders.push(wake);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  receive(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      const sender = this.senders.shift();
      if (sender) {
        sender(true);
      }
      const result: IteratorResult<T> = { value, done: false };
      return Promise.resolve(result);
    }
    if (this.closed) {
      const result: IteratorResult<T> = { value: undefined, done: true };
      return Promise.resolve(result);
    }
    return new Promise(resolve => this.receivers.push(resolve));
  }

  /** Buffered values stay readable after close. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of this.senders.splice(0)) {
      sender(false);
    }
  }

  /**
   * Delivers a last value past capacity, then closes. Never waits, so a
   * producer can always terminate the stream. A no-op once closed.
   */
  closeWith(value: T): void {
    if (this.closed) {
      return;
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
    } else {
      this.buffer.push(value);
    }
    this.close();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.receive(),
      return: async (): Promise<IteratorResult<T>> => {
        this.close();
        this.buffer = [];
        return { value: undefined, done: true };
      }
    };
  }
}

/**
 * Counting semaphore for bounding concurrent async work.
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(permits: number) {
    this.available = Math.max(1, Math.floor(permits));
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>(resolve => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }

  async run<R>(task: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
