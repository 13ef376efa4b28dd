import { BoundedQueue } from "./bounded-queue.js";
import { createLogger } from "./logger.js";
import { Metrics } from "./metrics.js";
import { NormalizedEvent } from "./schema.js";

const log = createLogger("live");

/**
 * One live consumer. Iterating yields events in publish order until the
 * subscription is closed; a consumer that falls behind loses its oldest
 * undelivered events, never blocks the publisher.
 */
export class Subscription implements AsyncIterable<NormalizedEvent> {
  private queue: BoundedQueue<NormalizedEvent>;

  constructor(
    readonly id: number,
    capacity: number,
    private onClose: (sub: Subscription) => void,
  ) {
    this.queue = new BoundedQueue<NormalizedEvent>(capacity);
  }

  get pending() {
    return this.queue.size;
  }

  get dropped() {
    return this.queue.evictions;
  }

  get closed() {
    return this.queue.isClosed;
  }

  deliver(event: NormalizedEvent): boolean {
    return this.queue.offer(event) !== null;
  }

  next(): Promise<NormalizedEvent | undefined> {
    return this.queue.take();
  }

  close() {
    if (this.queue.isClosed) return;
    this.queue.close();
    this.queue.drain();
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<NormalizedEvent> {
    return this.queue[Symbol.asyncIterator]();
  }
}

export class LiveHub {
  private subscribers = new Map<number, Subscription>();
  private nextId = 1;

  constructor(
    private metrics: Metrics,
    private defaultCapacity = 100,
  ) {}

  get subscriberCount() {
    return this.subscribers.size;
  }

  subscribe(capacity = this.defaultCapacity): Subscription {
    const sub = new Subscription(this.nextId++, capacity, (s) => this.subscribers.delete(s.id));
    this.subscribers.set(sub.id, sub);
    log.debug(`subscriber ${sub.id} joined (${this.subscribers.size} active)`);
    return sub;
  }

  unsubscribe(sub: Subscription) {
    sub.close();
  }

  /** Fans one event out to every subscriber without waiting on any of them. */
  publish(event: NormalizedEvent) {
    this.metrics.inc("events_published");
    for (const sub of this.subscribers.values()) {
      if (sub.deliver(event)) this.metrics.inc("subscriber_evictions");
    }
  }

  close() {
    for (const sub of Array.from(this.subscribers.values())) sub.close();
  }
}
