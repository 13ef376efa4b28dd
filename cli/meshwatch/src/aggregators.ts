import { PortNum, decodeRecord } from "./decoders.js";
import { traceEdges } from "./path-assembler.js";
import { Edge, EdgeKind, TrafficRow } from "./schema.js";
import { MeshReader } from "./store.js";

export type EdgeFilter = EdgeKind | "all";

const MAX_NEIGHBOR_PACKETS = 5000;

function neighborEdges(store: MeshReader, sinceMs: number): Edge[] {
  const edges: Edge[] = [];
  const packets = store.listPacketsByPort(PortNum.NEIGHBORINFO_APP, sinceMs, MAX_NEIGHBOR_PACKETS);
  for (const packet of packets) {
    if (!packet.payload) continue;
    const res = decodeRecord("neighborinfo", PortNum.NEIGHBORINFO_APP, packet.payload);
    if (!res.ok || res.value.kind !== "neighborinfo") continue;
    // Neighbor lists describe links heard by the reporter.
    for (const neighbor of res.value.neighbors) {
      if (neighbor.nodeId === 0 || neighbor.nodeId === packet.fromNodeId) continue;
      edges.push({ from: neighbor.nodeId, to: packet.fromNodeId, kind: "neighbor", observedAt: packet.importTime });
    }
  }
  return edges;
}

/**
 * Directed links seen since `sinceMs`, one per (from, to), carrying the most
 * recent observation and its source. Ordered by from, then to.
 */
export function buildEdges(store: MeshReader, sinceMs: number, filter: EdgeFilter = "all"): Edge[] {
  const all: Edge[] = [];
  if (filter === "all" || filter === "trace") {
    for (const record of store.listTraceroutesSince(sinceMs)) all.push(...traceEdges(record));
  }
  if (filter === "all" || filter === "neighbor") all.push(...neighborEdges(store, sinceMs));

  const latest = new Map<string, Edge>();
  for (const edge of all) {
    const key = `${edge.from}:${edge.to}`;
    const seen = latest.get(key);
    if (!seen || edge.observedAt > seen.observedAt) latest.set(key, edge);
  }
  return Array.from(latest.values()).sort((a, b) => a.from - b.from || a.to - b.to);
}

/** Senders ranked by how many gateway sightings their packets drew. */
export function topTraffic(store: MeshReader, sinceMs: number, limit = 50): TrafficRow[] {
  return store.topTraffic(sinceMs, Math.max(1, Math.floor(limit)));
}
