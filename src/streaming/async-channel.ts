// =============================================================================
// AsyncChannel<T> — Push-to-pull bridge implementing AsyncIterable
// =============================================================================

interface Waiter<T> {
  resolve: (value: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter.resolve({ value: undefined, done: true });
    }
    this.waiters = [];
  }

  /** Close the channel so that the consumer sees `error` once the buffer is drained. */
  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter.reject(error);
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.buffer.length > 0) {
          const [value] = this.buffer.splice(0, 1);
          return Promise.resolve({ value, done: false });
        }
        if (this.failure) {
          return Promise.reject(this.failure.error);
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve, reject) => {
          this.waiters.push({ resolve, reject });
        });
      },
    };
  }
}

export interface PushSource {
  /** Hand this to a binding as its raw payload. */
  readonly source: AsyncIterable<string>;
  push(chunk: string): void;
  end(): void;
  fail(error: unknown): void;
}

/**
 * Adapts a callback-style producer (websocket, SSE handler, event emitter)
 * to the pull-based raw payload a binding returns.
 *
 * @example
 * ```ts
 * operations.register("Summarize", "ws", {
 *   returns: t.ref("Summary"),
 *   invoke: () => {
 *     const feed = createPushSource();
 *     socket.on("message", (text) => feed.push(String(text)));
 *     socket.on("close", () => feed.end());
 *     return feed.source;
 *   },
 * });
 * ```
 */
export function createPushSource(): PushSource {
  const channel = new AsyncChannel<string>();
  return {
    source: channel,
    push: (chunk) => channel.push(chunk),
    end: () => channel.close(),
    fail: (error) => channel.fail(error),
  };
}
