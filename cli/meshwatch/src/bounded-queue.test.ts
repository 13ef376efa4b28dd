import { describe, expect, it } from "vitest";
import { BoundedQueue } from "./bounded-queue.js";

type Item = { n: number };
const item = (n: number): Item => ({ n });

describe("BoundedQueue", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new BoundedQueue<Item>(0)).toThrow(RangeError);
  });

  it("evicts the oldest item when offered past capacity", () => {
    const q = new BoundedQueue<Item>(2);
    expect(q.offer(item(1))).toBeNull();
    expect(q.offer(item(2))).toBeNull();
    expect(q.offer(item(3))).toEqual({ evicted: item(1) });
    expect(q.size).toBe(2);
    expect(q.evictions).toBe(1);
    expect(q.drain()).toEqual([item(2), item(3)]);
  });

  it("hands an offered item straight to a waiting taker", async () => {
    const q = new BoundedQueue<Item>(1);
    const pending = q.take();
    q.offer(item(7));
    await expect(pending).resolves.toEqual(item(7));
    expect(q.size).toBe(0);
  });

  it("makes put wait for room", async () => {
    const q = new BoundedQueue<Item>(1);
    await expect(q.put(item(1))).resolves.toBe(true);
    let admitted = false;
    const second = q.put(item(2)).then((ok) => {
      admitted = ok;
    });
    await Promise.resolve();
    expect(admitted).toBe(false);
    expect(q.tryTake()).toEqual(item(1));
    await second;
    expect(admitted).toBe(true);
    expect(q.tryTake()).toEqual(item(2));
  });

  it("releases takers and putters on close", async () => {
    const q = new BoundedQueue<Item>(1);
    const taker = q.take();
    q.close();
    await expect(taker).resolves.toBeUndefined();

    const full = new BoundedQueue<Item>(1);
    await full.put(item(1));
    const putter = full.put(item(2));
    full.close();
    await expect(putter).resolves.toBe(false);
    expect(full.offer(item(3))).toBeNull();
    expect(full.size).toBe(1);
  });

  it("iterates remaining items after close, then ends", async () => {
    const q = new BoundedQueue<Item>(3);
    q.offer(item(1));
    q.offer(item(2));
    q.close();
    const seen: number[] = [];
    for await (const it of q) seen.push(it.n);
    expect(seen).toEqual([1, 2]);
  });
});
