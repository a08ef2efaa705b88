const CLOSED = Symbol('closed');

type QueueItem<T> = T | typeof CLOSED;

/**
 * Single-producer/single-consumer hand-off. `push` never blocks; `close`
 * enqueues a sentinel so the consumer drains everything pushed before it and
 * then finishes.
 */
export class AudioChunkQueue<T = Buffer> implements AsyncIterable<T> {
  private readonly items: QueueItem<T>[] = [];
  private waiter: ((item: QueueItem<T>) => void) | undefined;
  private closed = false;

  public push(item: T): boolean {
    if (this.closed) {
      return false;
    }

    this.deliver(item);
    return true;
  }

  public close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.deliver(CLOSED);
  }

  public async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.take();
      if (item === CLOSED) {
        return;
      }

      yield item;
    }
  }

  private deliver(item: QueueItem<T>): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
      return;
    }

    this.items.push(item);
  }

  private take(): Promise<QueueItem<T>> {
    if (this.items.length > 0) {
      const head = this.items.shift();
      if (head !== undefined) {
        return Promise.resolve(head);
      }
    }

    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }
}
