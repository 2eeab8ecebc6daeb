/**
 * Unbounded in-memory channel.
 *
 * Values are delivered to receivers in send order, each value to exactly one
 * receiver. Once closed, pending and future receives resolve `undefined` after
 * the buffer drains. This is the only synchronization primitive the worker
 * pool needs: the job queue and the results stream are both channels.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[];
  private waiting: Array<(value: T | undefined) => void>;
  private closed: boolean;

  constructor() {
    this.buffer = [];
    this.waiting = [];
    this.closed = false;
  }

  /**
   * Push a value. Throws if the channel was already closed.
   */
  send(value: T): void {
    if (this.closed) {
      throw new Error("Cannot send on a closed channel");
    }

    const receiver = this.waiting.shift();
    if (receiver) {
      receiver(value);
      return;
    }
    this.buffer.push(value);
  }

  /**
   * Resolve with the next value, or `undefined` once closed and drained.
   */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Close the channel. Buffered values remain receivable.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    // Buffer is empty whenever anyone is waiting
    for (const receiver of this.waiting.splice(0)) {
      receiver(undefined);
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Values sent but not yet received */
  get size(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const value = await this.receive();
      if (value === undefined) {
        return;
      }
      yield value;
    }
  }
}

/**
 * One-shot job queue: every index 0..total-1 is sent, then the channel is
 * closed. Workers exit their loop when the queue is drained.
 */
export function createJobQueue(total: number): Channel<number> {
  const queue = new Channel<number>();
  for (let index = 0; index < total; index++) {
    queue.send(index);
  }
  queue.close();
  return queue;
}
