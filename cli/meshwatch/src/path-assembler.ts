import { AnomalyWarning } from "./errors.js";
import { createLogger } from "./logger.js";
import { Metrics } from "./metrics.js";
import { DecodedEnvelope, Edge, RouteTrace, TracerouteRecord } from "./schema.js";
import { MeshWriter } from "./store.js";
import { parseNodeRef } from "./util.js";

const log = createLogger("paths");

export type TraceUpdate = {
  packetId: number;
  fromNodeId: number;
  toNodeId: number;
  route: number[];
  snrTowards: number[];
  routeBack: number[] | null;
  snrBack: number[] | null;
  done: boolean;
  gatewayNodeId: string;
  observedAt: number;
};

export type AssembleResult = {
  record: TracerouteRecord;
  edges: Edge[];
  anomaly: boolean;
};

type RouteMerge = { route: number[] | null; changed: boolean; conflict: boolean };

function isPrefix(prefix: number[], of: number[]): boolean {
  if (prefix.length > of.length) return false;
  return prefix.every((hop, i) => of[i] === hop);
}

/**
 * Stored routes only grow. An incoming route that extends the stored one
 * replaces it, one that is a prefix of it changes nothing, and a diverging
 * route is a conflict where the stored (first-seen) route stays.
 */
export function mergeRoute(stored: number[] | null, incoming: number[] | null): RouteMerge {
  if (incoming === null) return { route: stored, changed: false, conflict: false };
  if (stored === null) return { route: incoming, changed: true, conflict: false };
  if (isPrefix(incoming, stored)) return { route: stored, changed: false, conflict: false };
  if (isPrefix(stored, incoming)) return { route: incoming, changed: true, conflict: false };
  return { route: stored, changed: false, conflict: true };
}

/**
 * Keys a traceroute payload to its exchange. A request is keyed by its own
 * id and sender; a reply points back at the request through `requestId` and
 * is addressed to the original requester.
 */
export function traceUpdateFrom(envelope: DecodedEnvelope, trace: RouteTrace, observedAt: number): TraceUpdate | null {
  if (envelope.wantResponse) {
    return {
      packetId: envelope.packetId,
      fromNodeId: envelope.fromNodeId,
      toNodeId: envelope.toNodeId,
      route: trace.route,
      snrTowards: trace.snrTowards,
      routeBack: trace.routeBack.length > 0 ? trace.routeBack : null,
      snrBack: trace.routeBack.length > 0 ? trace.snrBack : null,
      done: false,
      gatewayNodeId: envelope.gatewayNodeId,
      observedAt,
    };
  }
  if (envelope.requestId === 0) return null;
  return {
    packetId: envelope.requestId,
    fromNodeId: envelope.toNodeId,
    toNodeId: envelope.fromNodeId,
    route: trace.route,
    snrTowards: trace.snrTowards,
    routeBack: trace.routeBack,
    snrBack: trace.snrBack,
    done: true,
    gatewayNodeId: envelope.gatewayNodeId,
    observedAt,
  };
}

function pathEdges(path: number[], observedAt: number): Edge[] {
  const edges: Edge[] = [];
  for (let i = 0; i + 1 < path.length; i += 1) {
    const from = path[i];
    const to = path[i + 1];
    if (from === to) continue;
    edges.push({ from, to, kind: "trace", observedAt });
  }
  return edges;
}

/**
 * Edges along a traceroute. The forward path ends at the destination once
 * the reply is in, otherwise at the gateway that reported the request.
 */
export function traceEdges(record: TracerouteRecord): Edge[] {
  const end = record.done ? record.toNodeId : parseNodeRef(record.gatewayNodeId);
  const forward = [record.fromNodeId, ...record.route];
  if (end !== null) forward.push(end);
  const edges = pathEdges(forward, record.updatedAt);
  if (record.done && record.routeBack !== null) {
    edges.push(...pathEdges([record.toNodeId, ...record.routeBack, record.fromNodeId], record.updatedAt));
  }
  return edges;
}

export function applyTraceUpdate(
  existing: TracerouteRecord | null,
  update: TraceUpdate,
): { next: TracerouteRecord | null; conflict: boolean } {
  if (!existing) {
    return {
      next: {
        packetId: update.packetId,
        fromNodeId: update.fromNodeId,
        toNodeId: update.toNodeId,
        route: update.route,
        routeBack: update.routeBack,
        snrTowards: update.snrTowards,
        snrBack: update.snrBack,
        done: update.done,
        gatewayNodeId: update.gatewayNodeId,
        importTime: update.observedAt,
        updatedAt: update.observedAt,
      },
      conflict: false,
    };
  }
  const forward = mergeRoute(existing.route, update.route);
  const back = mergeRoute(existing.routeBack, update.routeBack);
  const done = existing.done || update.done;
  const conflict = forward.conflict || back.conflict;
  if (!forward.changed && !back.changed && done === existing.done) return { next: null, conflict };
  return {
    next: {
      ...existing,
      toNodeId: existing.toNodeId || update.toNodeId,
      route: forward.route ?? existing.route,
      snrTowards: forward.changed ? update.snrTowards : existing.snrTowards,
      routeBack: back.route,
      snrBack: back.changed ? update.snrBack : existing.snrBack,
      done,
      updatedAt: Math.max(existing.updatedAt, update.observedAt),
    },
    conflict,
  };
}

export class PathAssembler {
  constructor(
    private store: MeshWriter,
    private metrics: Metrics,
  ) {}

  async assemble(envelope: DecodedEnvelope, trace: RouteTrace, observedAt: number): Promise<AssembleResult | null> {
    const update = traceUpdateFrom(envelope, trace, observedAt);
    if (!update) return null;
    let conflict = false;
    const record = await this.store.updateTraceroute(update.packetId, update.fromNodeId, (existing) => {
      const result = applyTraceUpdate(existing, update);
      conflict = result.conflict;
      return result.next;
    });
    if (!record) return null;
    if (conflict) {
      this.metrics.inc("trace_anomalies");
      const warning = new AnomalyWarning(
        `conflicting route for traceroute ${update.packetId} from ${update.fromNodeId}; keeping first-seen route`,
      );
      log.warn(warning.message);
    }
    return { record, edges: traceEdges(record), anomaly: conflict };
  }
}
