import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { backoffDelay, BrokerClient, BrokerHandlers, Listener } from "./listener.js";
import { ConnectionState, Metrics } from "./metrics.js";

class FakeBroker extends EventEmitter implements BrokerClient {
  subscriptions: string[][] = [];
  ended = false;
  failSubscribe = false;

  constructor(handlers: BrokerHandlers) {
    super();
    this.on("connect", () => handlers.connect());
    this.on("message", (topic: string, payload: Uint8Array) => handlers.message(topic, payload));
    this.on("close", () => handlers.close());
  }

  async subscribe(topics: string[]) {
    if (this.failSubscribe) throw new Error("not authorized");
    this.subscriptions.push(topics);
  }

  async end() {
    this.ended = true;
  }
}

let clients: FakeBroker[];
let metrics: Metrics;
let listener: Listener;
let states: ConnectionState[];

function latest(): FakeBroker {
  const client = clients[clients.length - 1];
  if (!client) throw new Error("no broker client created");
  return client;
}

beforeEach(() => {
  vi.useFakeTimers();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  clients = [];
  metrics = new Metrics();
  listener = new Listener(
    { topics: ["msh/#", "region/#"], queueCapacity: 2, reconnectMinMs: 100, reconnectMaxMs: 1000 },
    (handlers) => {
      const client = new FakeBroker(handlers);
      clients.push(client);
      return client;
    },
    metrics,
  );
  states = [];
  listener.on("state", (s) => states.push(s));
});

afterEach(async () => {
  await listener.stop();
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("backoffDelay", () => {
  it("doubles from the minimum up to the cap", () => {
    expect([1, 2, 3, 4, 5, 6].map((a) => backoffDelay(a, 100, 1000))).toEqual([100, 200, 400, 800, 1000, 1000]);
  });
});

describe("Listener", () => {
  it("subscribes to every topic filter on connect", async () => {
    listener.start();
    latest().emit("connect");
    await vi.advanceTimersByTimeAsync(0);
    expect(listener.state).toBe("connected");
    expect(latest().subscriptions).toEqual([["msh/#", "region/#"]]);
    expect(states).toEqual(["connecting", "connected"]);
  });

  it("drops the oldest message when the queue is full", () => {
    listener.start();
    latest().emit("connect");
    for (let i = 0; i < 3; i += 1) latest().emit("message", `region/sub/gw/${i}`, new Uint8Array([i]));
    expect(metrics.get("raw_in")).toBe(3);
    expect(metrics.get("raw_dropped")).toBe(1);
    expect(listener.messages.drain().map((m) => m.topic)).toEqual(["region/sub/gw/1", "region/sub/gw/2"]);
  });

  it("reconnects with backoff and resubscribes", async () => {
    listener.start();
    latest().emit("connect");
    latest().emit("close");
    expect(listener.state).toBe("reconnecting");
    expect(clients).toHaveLength(1);
    expect(clients[0].ended).toBe(true);

    await vi.advanceTimersByTimeAsync(99);
    expect(clients).toHaveLength(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(clients).toHaveLength(2);

    // Second failure in a row waits twice as long.
    latest().emit("close");
    await vi.advanceTimersByTimeAsync(199);
    expect(clients).toHaveLength(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(clients).toHaveLength(3);

    latest().emit("connect");
    await vi.advanceTimersByTimeAsync(0);
    expect(latest().subscriptions).toEqual([["msh/#", "region/#"]]);
    expect(metrics.get("reconnects")).toBe(2);
    expect(states).toEqual(["connecting", "connected", "reconnecting", "connected"]);
  });

  it("ignores events from a client it has replaced", () => {
    listener.start();
    const first = latest();
    first.emit("close");
    first.emit("message", "region/sub/gw/1", new Uint8Array([1]));
    first.emit("close");
    expect(metrics.get("raw_in")).toBe(0);
    expect(metrics.get("reconnects")).toBe(1);
  });

  it("reconnects when a subscription is refused", async () => {
    listener.start();
    latest().failSubscribe = true;
    latest().emit("connect");
    await vi.advanceTimersByTimeAsync(0);
    expect(listener.state).toBe("reconnecting");
    expect(metrics.snapshot().last_error).toBe("subscribe failed: not authorized");
  });

  it("stops cleanly and closes the queue", async () => {
    listener.start();
    latest().emit("connect");
    await listener.stop();
    expect(listener.state).toBe("stopped");
    expect(latest().ended).toBe(true);
    expect(listener.messages.isClosed).toBe(true);
    latest().emit("close");
    await vi.advanceTimersByTimeAsync(5000);
    expect(clients).toHaveLength(1);
  });
});
