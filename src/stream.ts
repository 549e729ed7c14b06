import type { Event, SubscriptionHandle } from "./types.js";

/**
 * Live subscription handle: events pushed by the pool are delivered through
 * async iteration until close() is called
 */
export class LiveSubscription implements SubscriptionHandle {
  readonly id: string;
  private readonly onClose: () => Promise<void>;
  private queue: Event[] = [];
  private resolvers: Array<(value: IteratorResult<Event, undefined>) => void> = [];
  private closed = false;

  constructor(id: string, onClose: () => Promise<void>) {
    this.id = id;
    this.onClose = onClose;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Close the subscription and end every pending iterator
   */
  async close(): Promise<void> {
    if (this.closed) return;

    this.closed = true;

    for (const resolver of this.resolvers) {
      resolver({ done: true, value: undefined });
    }
    this.resolvers = [];

    await this.onClose();
  }

  /**
   * Add an event to the queue for async iteration
   */
  push(event: Event): void {
    if (this.closed) return;

    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver({ done: false, value: event });
    } else {
      this.queue.push(event);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterableIterator<Event> {
    while (!this.closed || this.queue.length > 0) {
      const queued = this.queue.shift();
      if (queued) {
        yield queued;
        continue;
      }

      const result = await new Promise<IteratorResult<Event, undefined>>((resolve) => {
        if (this.closed) {
          resolve({ done: true, value: undefined });
          return;
        }
        this.resolvers.push(resolve);
      });

      if (result.done) {
        break;
      }
      yield result.value;
    }
  }
}
