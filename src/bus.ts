import type { BusEvent } from './types.js';
import { createLogger } from './logger.js';

const log = createLogger('bus');

export const DEFAULT_MAX_QUEUE = 100;

/**
 * One attached observer. Events queue here until the owner pulls them with
 * `next()`; `next()` resolves to null once the subscription is closed.
 */
export class Subscription {
  private readonly queue: BusEvent[] = [];
  private waiter: ((event: BusEvent | null) => void) | null = null;
  private isClosed = false;
  private peak = 0;
  private readonly closeHandlers: Array<() => void> = [];

  constructor(readonly id: number, private readonly maxQueue: number) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.queue.length;
  }

  // Deepest the queue has been, for spotting slow clients
  get highWater(): number {
    return this.peak;
  }

  /** @returns false when the queue overflowed and the event was refused */
  deliver(event: BusEvent): boolean {
    if (this.isClosed) return false;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(event);
      return true;
    }
    if (this.queue.length >= this.maxQueue) return false;
    this.queue.push(event);
    this.peak = Math.max(this.peak, this.queue.length);
    return true;
  }

  next(): Promise<BusEvent | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.isClosed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** @returns a function that removes the handler again */
  onClose(handler: () => void): () => void {
    if (this.isClosed) {
      handler();
      return () => {};
    }
    this.closeHandlers.push(handler);
    return () => {
      const i = this.closeHandlers.indexOf(handler);
      if (i >= 0) this.closeHandlers.splice(i, 1);
    };
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.queue.length = 0;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(null);
    }
    for (const handler of this.closeHandlers.splice(0)) handler();
  }
}

/**
 * In-process fan-out to every attached subscriber. No history: a subscriber
 * sees only what is published while it is attached. A subscriber whose
 * queue is full is dropped instead of holding up the publisher.
 */
export class EventBus {
  private readonly subscribers = new Set<Subscription>();
  private nextId = 1;

  constructor(private maxQueue = DEFAULT_MAX_QUEUE) {}

  get size(): number {
    return this.subscribers.size;
  }

  setMaxQueue(maxQueue: number): void {
    this.maxQueue = maxQueue;
  }

  subscribe(): Subscription {
    const sub = new Subscription(this.nextId++, this.maxQueue);
    this.subscribers.add(sub);
    sub.onClose(() => {
      this.subscribers.delete(sub);
      log.debug(`Subscriber ${sub.id} detached (${this.subscribers.size} left)`);
    });
    log.debug(`Subscriber ${sub.id} attached (${this.subscribers.size} total)`);
    return sub;
  }

  unsubscribe(sub: Subscription): void {
    sub.close();
  }

  publish(event: BusEvent): void {
    for (const sub of [...this.subscribers]) {
      if (!sub.deliver(event)) {
        log.warn(`Subscriber ${sub.id} dropped: outbound queue full (${sub.pending} events)`);
        sub.close();
      }
    }
  }
}
