/**
 * Unbounded single-consumer message channel. Every hop between components
 * (watcher → debouncer → orchestrator, supervisor → orchestrator) is one of these.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private closed = false;

  /** Returns false when the channel is already closed and the value was dropped. */
  send(value: T): boolean {
    if (this.closed) return false;
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const next = this.buffer.shift();
    if (next) return Promise.resolve({ value: next.value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => this.receivers.push(resolve));
  }

  tryReceive(): { value: T } | undefined {
    return this.buffer.shift();
  }

  /** Buffered values are still delivered after close. */
  close() {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}

/** Moves every value of `source` into `target` until either side ends. */
export async function forward<T, U>(
  source: AsyncIterable<T>,
  target: Channel<U>,
  map: (value: T) => U,
): Promise<void> {
  for await (const value of source) {
    if (!target.send(map(value))) break;
  }
}
