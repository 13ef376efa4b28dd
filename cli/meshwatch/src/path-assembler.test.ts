import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Metrics } from "./metrics.js";
import { mergeRoute, PathAssembler, traceEdges, traceUpdateFrom } from "./path-assembler.js";
import { RouteTrace, TracerouteRecord } from "./schema.js";
import { SqliteStore } from "./sqlite-store.js";
import { decodedEnvelope } from "./test-support.js";

const trace = (route: number[], routeBack: number[] = []): RouteTrace => ({
  route,
  snrTowards: route.map(() => 2),
  routeBack,
  snrBack: routeBack.map(() => 1),
});

describe("mergeRoute", () => {
  it("takes the incoming route when nothing is stored", () => {
    expect(mergeRoute(null, [1, 2])).toEqual({ route: [1, 2], changed: true, conflict: false });
  });

  it("extends a stored prefix", () => {
    expect(mergeRoute([1], [1, 2])).toEqual({ route: [1, 2], changed: true, conflict: false });
  });

  it("ignores a shorter or equal route", () => {
    expect(mergeRoute([1, 2], [1])).toEqual({ route: [1, 2], changed: false, conflict: false });
    expect(mergeRoute([1, 2], [1, 2])).toEqual({ route: [1, 2], changed: false, conflict: false });
    expect(mergeRoute([1, 2], null)).toEqual({ route: [1, 2], changed: false, conflict: false });
  });

  it("keeps the stored route on divergence", () => {
    expect(mergeRoute([1, 2], [1, 3])).toEqual({ route: [1, 2], changed: false, conflict: true });
  });
});

describe("traceUpdateFrom", () => {
  it("keys a request by its own id and sender", () => {
    const env = decodedEnvelope({ packetId: 500, fromNodeId: 42, toNodeId: 7, wantResponse: true });
    expect(traceUpdateFrom(env, trace([10]), 1000)).toMatchObject({
      packetId: 500,
      fromNodeId: 42,
      toNodeId: 7,
      route: [10],
      routeBack: null,
      done: false,
    });
  });

  it("keys a reply by the request id and the requester", () => {
    const env = decodedEnvelope({ packetId: 501, fromNodeId: 7, toNodeId: 42, requestId: 500 });
    expect(traceUpdateFrom(env, trace([10], [11]), 2000)).toMatchObject({
      packetId: 500,
      fromNodeId: 42,
      toNodeId: 7,
      route: [10],
      routeBack: [11],
      done: true,
    });
  });

  it("ignores a trace that is neither request nor reply", () => {
    expect(traceUpdateFrom(decodedEnvelope(), trace([10]), 1000)).toBeNull();
  });
});

describe("traceEdges", () => {
  const record: TracerouteRecord = {
    packetId: 500,
    fromNodeId: 42,
    toNodeId: 7,
    route: [10, 11],
    routeBack: [12],
    snrTowards: [],
    snrBack: [],
    done: true,
    gatewayNodeId: "gatewayA",
    importTime: 1000,
    updatedAt: 2000,
  };

  it("walks the forward and return paths", () => {
    expect(traceEdges(record).map((e) => [e.from, e.to])).toEqual([
      [42, 10],
      [10, 11],
      [11, 7],
      [7, 12],
      [12, 42],
    ]);
    expect(traceEdges(record).every((e) => e.kind === "trace" && e.observedAt === 2000)).toBe(true);
  });

  it("ends an open request at the reporting gateway", () => {
    const open = { ...record, done: false, routeBack: null, route: [10], gatewayNodeId: "!0000000b" };
    expect(traceEdges(open).map((e) => [e.from, e.to])).toEqual([
      [42, 10],
      [10, 11],
    ]);
  });

  it("skips self loops", () => {
    const open = { ...record, done: false, routeBack: null, route: [10], gatewayNodeId: "!0000000a" };
    expect(traceEdges(open).map((e) => [e.from, e.to])).toEqual([[42, 10]]);
  });
});

describe("PathAssembler", () => {
  let store: SqliteStore;
  let metrics: Metrics;
  let assembler: PathAssembler;

  beforeEach(() => {
    store = new SqliteStore(":memory:");
    metrics = new Metrics();
    assembler = new PathAssembler(store, metrics);
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  const request = decodedEnvelope({ packetId: 500, fromNodeId: 42, toNodeId: 7, wantResponse: true });
  const reply = decodedEnvelope({ packetId: 501, fromNodeId: 7, toNodeId: 42, requestId: 500 });

  it("attaches the return route to the existing record", async () => {
    await assembler.assemble(request, trace([10]), 1000);
    const result = await assembler.assemble(reply, trace([10], [11]), 2000);
    expect(result?.anomaly).toBe(false);
    expect(store.listTraceroutesSince(0)).toHaveLength(1);
    expect(store.getTraceroute(500, 42)).toMatchObject({
      route: [10],
      routeBack: [11],
      snrBack: [1],
      done: true,
      importTime: 1000,
      updatedAt: 2000,
    });
  });

  it("keeps the first forward route on conflict and counts it", async () => {
    const warn = vi.spyOn(console, "error").mockImplementation(() => undefined);
    await assembler.assemble(request, trace([10, 11]), 1000);
    const result = await assembler.assemble(request, trace([10, 12]), 1500);
    expect(result?.anomaly).toBe(true);
    expect(store.getTraceroute(500, 42)?.route).toEqual([10, 11]);
    expect(metrics.get("trace_anomalies")).toBe(1);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("never shortens a stored route", async () => {
    await assembler.assemble(request, trace([10, 11]), 1000);
    await assembler.assemble(request, trace([10]), 1500);
    expect(store.getTraceroute(500, 42)?.route).toEqual([10, 11]);
    expect(store.getTraceroute(500, 42)?.updatedAt).toBe(1000);
  });
});
