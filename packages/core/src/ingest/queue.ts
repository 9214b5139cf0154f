/**
 * Push-to-pull bridge between a transport's callbacks and `Ingestor.run()`.
 *
 * Messages pushed while nobody is reading are buffered up to `limit`;
 * beyond that the newest message is refused and counted.
 */
export class InboundQueue<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private waitingResolve: ((result: IteratorResult<T>) => void) | null = null;
  private closed = false;
  private refused = 0;

  constructor(private readonly limit = 10_000) {}

  get pending(): number {
    return this.queue.length;
  }

  get overflowed(): number {
    return this.refused;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the item was refused (queue closed or full). */
  push(item: T): boolean {
    if (this.closed) return false;

    if (this.waitingResolve) {
      this.waitingResolve({ value: item, done: false });
      this.waitingResolve = null;
      return true;
    }
    if (this.queue.length >= this.limit) {
      this.refused++;
      return false;
    }
    this.queue.push(item);
    return true;
  }

  /** Buffered items are still delivered; the iterator ends once they are drained. */
  close(): void {
    this.closed = true;
    if (this.waitingResolve) {
      this.waitingResolve({ value: undefined, done: true });
      this.waitingResolve = null;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.queue.length > 0) {
          const [item] = this.queue.splice(0, 1);
          return Promise.resolve({ value: item, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise(resolve => {
          this.waitingResolve = resolve;
        });
      },
    };
  }
}
