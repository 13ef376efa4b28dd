import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BoundedQueue } from "./bounded-queue.js";
import { PortNum } from "./decoders.js";
import { distanceKm } from "./distance.js";
import { StoreConflictError } from "./errors.js";
import { LiveHub } from "./live-hub.js";
import { Metrics } from "./metrics.js";
import { DecodedWork, Pipeline } from "./pipeline.js";
import { encodeMessage, meshTypes } from "./proto.js";
import { RawMessage } from "./schema.js";
import { SqliteStore } from "./sqlite-store.js";
import {
  encryptedEnvelopeBytes,
  envelopeBytes,
  positionPayload,
  rawMessage,
  RECEIVED_AT,
  routeReplyPayload,
  testContext,
  tracePayload,
  userPayload,
} from "./test-support.js";

let raw: BoundedQueue<RawMessage>;
let store: SqliteStore;
let hub: LiveHub;
let metrics: Metrics;
let pipeline: Pipeline;

function makePipeline(keys = testContext()) {
  return new Pipeline(raw, store, hub, metrics, {
    envelope: keys,
    decodeWorkers: 2,
    storeWorkers: 2,
    decodedQueueCapacity: 4,
    retry: { timeoutMs: 200, attempts: 2, backoffMs: 1 },
  });
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  raw = new BoundedQueue<RawMessage>(100);
  store = new SqliteStore(":memory:");
  metrics = new Metrics();
  hub = new LiveHub(metrics, 10);
  pipeline = makePipeline();
});

afterEach(async () => {
  await pipeline.stop();
  store.close();
  vi.restoreAllMocks();
});

const positionMessage = (gateway: string, packetId = 77) =>
  rawMessage(
    `region/sub/${gateway}/1234`,
    envelopeBytes({ packetId, from: 42, portnum: PortNum.POSITION_APP, payload: positionPayload(37, -122) }),
  );

function decodeOrFail(message: RawMessage): DecodedWork {
  const work = pipeline.decode(message);
  if (!work) throw new Error("expected message to decode");
  return work;
}

describe("Pipeline", () => {
  it("stores the packet, one observation and the sender position", async () => {
    const event = await pipeline.process(decodeOrFail(positionMessage("gatewayA")));
    expect(store.getNode(42)?.lastPosition).toEqual({ lat: 37, lon: -122, alt: null });
    expect(store.getPacket(77, 42)).not.toBeNull();
    expect(store.listPacketSeen(77, 42).map((s) => s.gatewayNodeId)).toEqual(["gatewayA"]);
    expect(event).toMatchObject({
      packetId: 77,
      fromNodeId: 42,
      gatewayNodeId: "gatewayA",
      channel: "1234",
      kind: "position",
      record: { kind: "position", position: { lat: 37, lon: -122, alt: null }, time: 0 },
      distanceKm: null,
      firstSighting: true,
      importTime: "2023-11-14T22:13:20.000Z",
    });
  });

  it("adds a second observation for another gateway without a second packet", async () => {
    await pipeline.process(decodeOrFail(positionMessage("gatewayA")));
    const event = await pipeline.process(decodeOrFail(positionMessage("gatewayB")));
    expect(event?.firstSighting).toBe(false);
    expect(store.listPackets()).toHaveLength(1);
    expect(store.listPacketSeen(77, 42).map((s) => s.gatewayNodeId)).toEqual(["gatewayA", "gatewayB"]);
  });

  it("publishes nothing for a repeat from the same gateway", async () => {
    const sub = hub.subscribe();
    await pipeline.process(decodeOrFail(positionMessage("gatewayA")));
    expect(await pipeline.process(decodeOrFail(positionMessage("gatewayA")))).toBeNull();
    expect(sub.pending).toBe(1);
    expect(metrics.get("dedup_noops")).toBe(1);
  });

  it("isolates a truncated message from the ones after it", async () => {
    const good = positionMessage("gatewayA", 78);
    const truncated = rawMessage("region/sub/gatewayA/1234", good.payload.subarray(0, 5));
    expect(pipeline.decode(truncated)).toBeNull();
    expect(metrics.get("decode_failures")).toBe(1);
    expect(store.listPackets()).toEqual([]);
    expect(store.listNodes()).toEqual([]);

    await pipeline.process(decodeOrFail(good));
    expect(store.getPacket(78, 42)).not.toBeNull();
  });

  it("counts rejected topics separately", () => {
    const message = rawMessage("region/gatewayA/1234", positionMessage("gatewayA").payload);
    expect(pipeline.decode(message)).toBeNull();
    expect(metrics.get("topic_rejected")).toBe(1);
    expect(metrics.get("decode_failures")).toBe(0);
  });

  it("records undecryptable packets as opaque observations", async () => {
    pipeline = makePipeline(testContext([]));
    const bytes = encryptedEnvelopeBytes({ packetId: 90, from: 42, payload: positionPayload(37, -122) });
    const event = await pipeline.process(decodeOrFail(rawMessage("region/sub/gatewayA/1234", bytes)));
    expect(metrics.get("undecryptable")).toBe(1);
    expect(event).toMatchObject({ kind: "encrypted", record: null });
    expect(store.getPacket(90, 42)).toMatchObject({ portnum: null, kind: "encrypted" });
    expect(store.getNode(42)?.lastPosition).toBeNull();
  });

  it("resolves names and the distance to a gateway with a known position", async () => {
    await store.mergeNodeField(10, { field: "position", value: { lat: 37.5, lon: -122, alt: null } }, 1);
    await store.mergeNodeField(10, { field: "longName", value: "Gateway Ten" }, 1);
    const nameMessage = rawMessage(
      "region/sub/!0000000a/1234",
      envelopeBytes({ packetId: 70, from: 42, portnum: PortNum.NODEINFO_APP, payload: userPayload("Ridge", "RG") }),
    );
    await pipeline.process(decodeOrFail(nameMessage));
    const event = await pipeline.process(decodeOrFail(positionMessage("!0000000a")));
    expect(event?.fromName).toBe("Ridge");
    expect(event?.gatewayName).toBe("Gateway Ten");
    expect(event?.distanceKm).toBe(
      distanceKm({ lat: 37, lon: -122, alt: null }, { lat: 37.5, lon: -122, alt: null }),
    );
  });

  it("assembles a traceroute from request and reply", async () => {
    const request = rawMessage(
      "region/sub/gatewayA/1234",
      envelopeBytes({
        packetId: 500,
        from: 42,
        to: 7,
        portnum: PortNum.TRACEROUTE_APP,
        payload: tracePayload([10]),
        wantResponse: true,
      }),
    );
    const reply = rawMessage(
      "region/sub/gatewayA/1234",
      envelopeBytes({
        packetId: 501,
        from: 7,
        to: 42,
        portnum: PortNum.TRACEROUTE_APP,
        payload: tracePayload([10], [11]),
        requestId: 500,
      }),
    );
    const first = await pipeline.process(decodeOrFail(request));
    expect(first?.edges).toEqual([{ from: 42, to: 10, kind: "trace", observedAt: RECEIVED_AT }]);
    const event = await pipeline.process(decodeOrFail(reply));
    expect(store.getTraceroute(500, 42)).toMatchObject({ route: [10], routeBack: [11], done: true, toNodeId: 7 });
    expect(event?.edges).toEqual([
      { from: 42, to: 10, kind: "trace", observedAt: RECEIVED_AT },
      { from: 10, to: 7, kind: "trace", observedAt: RECEIVED_AT },
      { from: 7, to: 11, kind: "trace", observedAt: RECEIVED_AT },
      { from: 11, to: 42, kind: "trace", observedAt: RECEIVED_AT },
    ]);
  });

  it("assembles a route reply carried on the routing port", async () => {
    const reply = rawMessage(
      "region/sub/gatewayA/1234",
      envelopeBytes({
        packetId: 601,
        from: 7,
        to: 42,
        portnum: PortNum.ROUTING_APP,
        payload: routeReplyPayload([10, 12]),
        requestId: 600,
      }),
    );
    const event = await pipeline.process(decodeOrFail(reply));
    expect(store.getTraceroute(600, 42)).toMatchObject({ route: [10, 12], done: true, toNodeId: 7 });
    expect(event?.kind).toBe("routing");
    expect(event?.edges.map((e) => [e.from, e.to])).toEqual([
      [42, 10],
      [10, 12],
      [12, 7],
      [7, 42],
    ]);
  });

  it("finishes a sighting on redelivery when its first pass failed", async () => {
    vi.spyOn(store, "touchNode")
      .mockRejectedValueOnce(new Error("busy"))
      .mockRejectedValueOnce(new Error("busy"));
    await expect(pipeline.process(decodeOrFail(positionMessage("gatewayA")))).rejects.toThrow("busy");
    expect(store.getPacket(77, 42)).not.toBeNull();
    expect(store.getNode(42)).toBeNull();

    const sub = hub.subscribe();
    const event = await pipeline.process(decodeOrFail(positionMessage("gatewayA")));
    expect(event).toMatchObject({ packetId: 77, gatewayNodeId: "gatewayA", kind: "position" });
    expect(store.getNode(42)?.lastPosition).toEqual({ lat: 37, lon: -122, alt: null });
    expect(sub.pending).toBe(1);
    expect(metrics.get("sightings_resumed")).toBe(1);

    expect(await pipeline.process(decodeOrFail(positionMessage("gatewayA")))).toBeNull();
    expect(metrics.get("dedup_noops")).toBe(1);
    expect(sub.pending).toBe(1);
  });

  it("keeps environment and device telemetry side by side", async () => {
    const telemetry = (packetId: number, value: Record<string, unknown>, rxTime: number) =>
      rawMessage(
        "region/sub/gatewayA/1234",
        envelopeBytes({
          packetId,
          from: 42,
          portnum: PortNum.TELEMETRY_APP,
          payload: encodeMessage(meshTypes().Telemetry, value),
          rxTime,
        }),
      );
    await pipeline.process(decodeOrFail(telemetry(1, { deviceMetrics: { batteryLevel: 88 } }, 1000)));
    await pipeline.process(decodeOrFail(telemetry(2, { environmentMetrics: { temperature: 21 } }, 2000)));
    expect(store.getNode(42)).toMatchObject({
      deviceTelemetry: { batteryLevel: 88 },
      environmentTelemetry: { temperature: 21 },
    });
  });

  it("drains both stages through the worker pools", async () => {
    const sub = hub.subscribe();
    pipeline.start();
    raw.offer(positionMessage("gatewayA"));
    raw.offer(rawMessage("region/sub/gatewayA/1234", new Uint8Array([0x0a, 0x40, 0x01])));
    raw.offer(positionMessage("gatewayB"));
    raw.offer(positionMessage("gatewayA", 79));
    await pipeline.stop();
    expect(store.listPackets().map((p) => p.packetId).sort()).toEqual([77, 79]);
    expect(store.listPacketSeen(77, 42)).toHaveLength(2);
    expect(metrics.get("decode_failures")).toBe(1);
    expect(sub.pending).toBe(3);
  });

  it("treats a key conflict from the store as a duplicate", async () => {
    vi.spyOn(store, "recordPacket").mockRejectedValue(new StoreConflictError("77:42:gatewayA"));
    pipeline.start();
    raw.offer(positionMessage("gatewayA"));
    await pipeline.stop();
    expect(metrics.get("dedup_noops")).toBe(1);
    expect(metrics.get("store_drops")).toBe(0);
    expect(metrics.get("store_retries")).toBe(0);
  });

  it("drops work the store keeps failing on and reports degraded health", async () => {
    vi.spyOn(store, "recordPacket").mockRejectedValue(new Error("disk I/O error"));
    pipeline.start();
    for (let i = 1; i <= 3; i += 1) raw.offer(positionMessage("gatewayA", i));
    await pipeline.stop();
    expect(metrics.get("store_drops")).toBe(3);
    expect(metrics.get("store_retries")).toBe(3);
    expect(metrics.health()).toBe("degraded");
    expect(metrics.snapshot().last_error).toBe("dropped packet 3 from 42: disk I/O error");
  });
});
