// Small coordination primitives for the scan worker pool.

export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

type Pending<T> = { value: T; resolve: () => void };

/**
 * Bounded FIFO channel. `send` waits while the buffer is full; `receive` yields buffered
 * values first and reports `done` only once the channel is closed and drained.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private receivers: Array<(r: IteratorResult<T, undefined>) => void> = [];
  private senders: Pending<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<void> {
    if (this.closed) return Promise.reject(new Error('send on closed channel'));

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => this.senders.push({ value, resolve }));
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      // a blocked sender takes the freed slot
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise(resolve => this.receivers.push(resolve));
  }

  /** No further sends; values already buffered are still delivered. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    // receivers only wait on an empty buffer
    for (const r of this.receivers) r({ value: undefined, done: true });
    this.receivers = [];
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}

type LockMode = 'read' | 'write';

/**
 * Reader/writer lock: readers share, a writer is exclusive. Waiters are served in
 * arrival order, so readers that arrive after a queued writer wait behind it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Array<{ mode: LockMode; grant: () => void }> = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  get activeReaders(): number {
    return this.readers;
  }

  get isWriting(): boolean {
    return this.writing;
  }

  private canEnter(mode: LockMode): boolean {
    return mode === 'read' ? !this.writing : !this.writing && this.readers === 0;
  }

  private enter(mode: LockMode): void {
    if (mode === 'read') this.readers++;
    else this.writing = true;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.queue.push({ mode, grant: () => { this.enter(mode); resolve(); } });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') this.readers--;
    else this.writing = false;
    while (this.queue.length > 0 && this.canEnter(this.queue[0].mode)) {
      const next = this.queue.shift();
      if (!next) break;
      next.grant();
      if (next.mode === 'write') break;
    }
  }
}
