type PendingPut<T> = { item: T; resolve: (accepted: boolean) => void };

/**
 * Fixed-capacity FIFO shared by one producer side and one consumer side.
 *
 * `offer` never waits: a full queue evicts its oldest item. `put` waits for
 * room instead, which is how the decode stage applies backpressure. `take`
 * waits for an item and resolves `undefined` once the queue is closed and
 * drained.
 */
export class BoundedQueue<T extends object> implements AsyncIterable<T> {
  private items: T[] = [];
  private takers: Array<(item: T | undefined) => void> = [];
  private putters: Array<PendingPut<T>> = [];
  private closed = false;
  private evicted = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size() {
    return this.items.length;
  }

  get isClosed() {
    return this.closed;
  }

  get evictions() {
    return this.evicted;
  }

  /** Returns the evicted item when the queue was full. Offers after close are ignored. */
  offer(item: T): { evicted: T } | null {
    if (this.closed) return null;
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return null;
    }
    this.items.push(item);
    if (this.items.length > this.capacity) {
      const oldest = this.items[0];
      this.items.splice(0, 1);
      this.evicted++;
      return { evicted: oldest };
    }
    return null;
  }

  put(item: T): Promise<boolean> {
    if (this.closed) return Promise.resolve(false);
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return Promise.resolve(true);
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }
    return new Promise((resolve) => this.putters.push({ item, resolve }));
  }

  tryTake(): T | undefined {
    if (this.items.length === 0) return undefined;
    const item = this.items[0];
    this.items.splice(0, 1);
    this.admitPutter();
    return item;
  }

  take(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.tryTake());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.takers.push(resolve));
  }

  /** Empties the queue and returns what was in it. */
  drain(): T[] {
    const out = this.items;
    this.items = [];
    while (this.putters.length > 0 && this.items.length < this.capacity) this.admitPutter();
    return out;
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) taker(undefined);
    for (const putter of this.putters.splice(0)) putter.resolve(false);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.take();
      if (item === undefined) return;
      yield item;
    }
  }

  private admitPutter() {
    const next = this.putters.shift();
    if (!next) return;
    this.items.push(next.item);
    next.resolve(true);
  }
}
