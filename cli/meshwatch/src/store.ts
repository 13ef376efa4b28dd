import {
  DecodedEnvelope,
  NodeField,
  NodeFieldValue,
  NodeRecord,
  OpaqueObservation,
  PacketRecord,
  PacketSeenRecord,
  TracerouteRecord,
  TrafficRow,
} from "./schema.js";

export type NodeObservation = { [F in NodeField]: { field: F; value: NodeFieldValue[F] } }[NodeField];

export type RecordOutcome = {
  packetCreated: boolean;
  seenCreated: boolean;
  // A previously opaque canonical packet gained its decoded port and payload.
  enriched: boolean;
  // The sighting was already on record but an earlier delivery never finished processing it.
  pending: boolean;
};

export type TracerouteMutation = (existing: TracerouteRecord | null) => TracerouteRecord | null;

export type PacketQuery = {
  packetId?: number;
  fromNodeId?: number;
  toNodeId?: number;
  // Matches either end of the packet.
  nodeId?: number;
  portnum?: number;
  // Substring of a text message payload.
  contains?: string;
  sinceMs?: number;
  limit?: number;
};

export type NodeQuery = {
  activeSinceMs?: number;
  role?: string;
  channel?: string;
  hwModel?: string;
  limit?: number;
};

/**
 * Write side used by the pipeline. Every write is atomic per key: the
 * canonical packet, its per-gateway observation, a node field and a
 * traceroute record. Writes to different keys never wait on each other.
 */
export interface MeshWriter {
  /**
   * Inserts the canonical packet and the gateway's observation if absent.
   * Idempotent. A backend that cannot resolve a duplicate key itself
   * rejects with StoreConflictError, which callers treat as a no-op.
   */
  recordPacket(input: DecodedEnvelope | OpaqueObservation): Promise<RecordOutcome>;
  /** Marks a sighting's node merge, trace update and live event as done. */
  markSeenProcessed(packetId: number, fromNodeId: number, gatewayNodeId: string): Promise<void>;
  /** Field-level compare-and-set on observation time. Returns whether the value was applied. */
  mergeNodeField(nodeId: number, observation: NodeObservation, observedAt: number): Promise<boolean>;
  /** Advances `lastSeen` to the max of its value and `seenAt`, creating the node if needed. */
  touchNode(nodeId: number, seenAt: number): Promise<void>;
  /** Read-modify-write of one traceroute record under the store's per-key atomicity. */
  updateTraceroute(packetId: number, fromNodeId: number, mutate: TracerouteMutation): Promise<TracerouteRecord | null>;
}

/** Request/response reads for report-style callers. */
export interface MeshReader {
  getNode(nodeId: number): NodeRecord | null;
  listNodes(query?: NodeQuery): NodeRecord[];
  nodeNames(nodeIds: number[]): Map<number, string>;
  getPacket(packetId: number, fromNodeId: number): PacketRecord | null;
  listPackets(query?: PacketQuery): PacketRecord[];
  listPacketsByPort(portnum: number, sinceMs: number, limit?: number): PacketRecord[];
  listPacketSeen(packetId: number, fromNodeId: number): PacketSeenRecord[];
  getTraceroute(packetId: number, fromNodeId: number): TracerouteRecord | null;
  listTraceroutesSince(sinceMs: number): TracerouteRecord[];
  topTraffic(sinceMs: number, limit: number): TrafficRow[];
}

export interface MeshStore extends MeshWriter, MeshReader {
  close(): void;
}
