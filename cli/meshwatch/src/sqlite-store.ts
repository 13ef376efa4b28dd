import Database from "better-sqlite3";
import { DEVICE_METRIC_KEYS, ENVIRONMENT_METRIC_KEYS, pickMetrics } from "./decoders.js";
import { createLogger } from "./logger.js";
import {
  DecodedEnvelope,
  MessageKind,
  NodeField,
  NodeRecord,
  OpaqueObservation,
  PacketRecord,
  PacketSeenRecord,
  Position,
  TracerouteRecord,
  TrafficRow,
} from "./schema.js";
import { MeshStore, NodeObservation, NodeQuery, PacketQuery, RecordOutcome, TracerouteMutation } from "./store.js";
import { asBytes, asNumber, asNumberArray, asRecord, asString, safeJsonParse } from "./util.js";

const log = createLogger("store");

const SCHEMA = `
CREATE TABLE IF NOT EXISTS node (
  node_id INTEGER PRIMARY KEY,
  long_name TEXT, long_name_at INTEGER,
  short_name TEXT, short_name_at INTEGER,
  hw_model TEXT, hw_model_at INTEGER,
  role TEXT, role_at INTEGER,
  firmware TEXT, firmware_at INTEGER,
  channel TEXT, channel_at INTEGER,
  last_lat REAL, last_lon REAL, last_alt REAL, position_at INTEGER,
  device_telemetry TEXT, device_telemetry_at INTEGER,
  environment_telemetry TEXT, environment_telemetry_at INTEGER,
  last_seen INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_node_last_seen ON node(last_seen DESC);

CREATE TABLE IF NOT EXISTS packet (
  packet_id INTEGER NOT NULL,
  from_node_id INTEGER NOT NULL,
  to_node_id INTEGER NOT NULL,
  portnum INTEGER,
  kind TEXT NOT NULL,
  channel TEXT NOT NULL,
  payload BLOB,
  import_time INTEGER NOT NULL,
  PRIMARY KEY (packet_id, from_node_id)
);
CREATE INDEX IF NOT EXISTS idx_packet_from_node_time ON packet(from_node_id, import_time DESC);
CREATE INDEX IF NOT EXISTS idx_packet_import_time ON packet(import_time DESC);
CREATE INDEX IF NOT EXISTS idx_packet_portnum_time ON packet(portnum, import_time DESC);

CREATE TABLE IF NOT EXISTS packet_seen (
  packet_id INTEGER NOT NULL,
  from_node_id INTEGER NOT NULL,
  gateway_node_id TEXT NOT NULL,
  channel TEXT NOT NULL,
  topic TEXT NOT NULL,
  rssi INTEGER,
  snr REAL,
  hop_limit INTEGER NOT NULL,
  hop_start INTEGER NOT NULL,
  hop_count INTEGER,
  rx_time INTEGER NOT NULL,
  import_time INTEGER NOT NULL,
  processed INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (packet_id, from_node_id, gateway_node_id)
);
CREATE INDEX IF NOT EXISTS idx_packet_seen_packet_id ON packet_seen(packet_id);
CREATE INDEX IF NOT EXISTS idx_packet_seen_gateway ON packet_seen(gateway_node_id);

CREATE TABLE IF NOT EXISTS traceroute (
  packet_id INTEGER NOT NULL,
  from_node_id INTEGER NOT NULL,
  to_node_id INTEGER NOT NULL,
  route TEXT NOT NULL,
  route_back TEXT,
  snr_towards TEXT NOT NULL,
  snr_back TEXT,
  done INTEGER NOT NULL DEFAULT 0,
  gateway_node_id TEXT NOT NULL,
  import_time INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  PRIMARY KEY (packet_id, from_node_id)
);
CREATE INDEX IF NOT EXISTS idx_traceroute_updated_at ON traceroute(updated_at);
`;

const STRING_COLUMNS = {
  longName: "long_name",
  shortName: "short_name",
  hwModel: "hw_model",
  role: "role",
  firmware: "firmware",
  channel: "channel",
} as const;

function fieldAssignment(field: NodeField): { set: string; at: string } {
  if (field === "position") return { set: "last_lat = @lat, last_lon = @lon, last_alt = @alt", at: "position_at" };
  if (field === "deviceTelemetry") return { set: "device_telemetry = @value", at: "device_telemetry_at" };
  if (field === "environmentTelemetry") {
    return { set: "environment_telemetry = @value", at: "environment_telemetry_at" };
  }
  const column = STRING_COLUMNS[field];
  return { set: `${column} = @value`, at: `${column}_at` };
}

function fieldParams(observation: NodeObservation): Record<string, string | number | null> {
  switch (observation.field) {
    case "position":
      return { lat: observation.value.lat, lon: observation.value.lon, alt: observation.value.alt };
    case "deviceTelemetry":
    case "environmentTelemetry":
      return { value: JSON.stringify(observation.value) };
    default:
      return { value: observation.value };
  }
}

function numOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function strOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function jsonNumbers(value: unknown): number[] | null {
  if (typeof value !== "string") return null;
  const parsed = safeJsonParse(value);
  return parsed.ok ? asNumberArray(parsed.value) : null;
}

function jsonMetrics<K extends string>(value: unknown, keys: readonly K[]): Partial<Record<K, number>> | null {
  if (typeof value !== "string") return null;
  const parsed = safeJsonParse(value);
  return parsed.ok ? pickMetrics(asRecord(parsed.value), keys) : null;
}

function toNode(row: unknown): NodeRecord {
  const r = asRecord(row);
  const lat = numOrNull(r["last_lat"]);
  const lon = numOrNull(r["last_lon"]);
  const position: Position | null = lat !== null && lon !== null ? { lat, lon, alt: numOrNull(r["last_alt"]) } : null;
  return {
    nodeId: asNumber(r["node_id"]),
    longName: strOrNull(r["long_name"]),
    shortName: strOrNull(r["short_name"]),
    hwModel: strOrNull(r["hw_model"]),
    role: strOrNull(r["role"]),
    firmware: strOrNull(r["firmware"]),
    channel: strOrNull(r["channel"]),
    lastPosition: position,
    deviceTelemetry: jsonMetrics(r["device_telemetry"], DEVICE_METRIC_KEYS),
    environmentTelemetry: jsonMetrics(r["environment_telemetry"], ENVIRONMENT_METRIC_KEYS),
    lastSeen: asNumber(r["last_seen"]),
  };
}

const KINDS: ReadonlyArray<MessageKind | "encrypted"> = [
  "text",
  "position",
  "nodeinfo",
  "routing",
  "telemetry",
  "traceroute",
  "neighborinfo",
  "map_report",
  "unknown",
  "encrypted",
];

function toKind(value: unknown): MessageKind | "encrypted" {
  return KINDS.find((k) => k === value) ?? "unknown";
}

function toPacket(row: unknown): PacketRecord {
  const r = asRecord(row);
  return {
    packetId: asNumber(r["packet_id"]),
    fromNodeId: asNumber(r["from_node_id"]),
    toNodeId: asNumber(r["to_node_id"]),
    portnum: numOrNull(r["portnum"]),
    kind: toKind(r["kind"]),
    channel: asString(r["channel"]) ?? "",
    payload: asBytes(r["payload"]) ?? null,
    importTime: asNumber(r["import_time"]),
  };
}

function toSeen(row: unknown): PacketSeenRecord {
  const r = asRecord(row);
  return {
    packetId: asNumber(r["packet_id"]),
    fromNodeId: asNumber(r["from_node_id"]),
    gatewayNodeId: asString(r["gateway_node_id"]) ?? "",
    channel: asString(r["channel"]) ?? "",
    topic: asString(r["topic"]) ?? "",
    rssi: numOrNull(r["rssi"]),
    snr: numOrNull(r["snr"]),
    hopLimit: asNumber(r["hop_limit"]),
    hopStart: asNumber(r["hop_start"]),
    hopCount: numOrNull(r["hop_count"]),
    rxTime: asNumber(r["rx_time"]),
    importTime: asNumber(r["import_time"]),
  };
}

function toTraceroute(row: unknown): TracerouteRecord {
  const r = asRecord(row);
  return {
    packetId: asNumber(r["packet_id"]),
    fromNodeId: asNumber(r["from_node_id"]),
    toNodeId: asNumber(r["to_node_id"]),
    route: jsonNumbers(r["route"]) ?? [],
    routeBack: jsonNumbers(r["route_back"]),
    snrTowards: jsonNumbers(r["snr_towards"]) ?? [],
    snrBack: jsonNumbers(r["snr_back"]),
    done: asNumber(r["done"]) === 1,
    gatewayNodeId: asString(r["gateway_node_id"]) ?? "",
    importTime: asNumber(r["import_time"]),
    updatedAt: asNumber(r["updated_at"]),
  };
}

function toTraffic(row: unknown): TrafficRow {
  const r = asRecord(row);
  return {
    nodeId: asNumber(r["node_id"]),
    longName: strOrNull(r["long_name"]),
    shortName: strOrNull(r["short_name"]),
    channel: strOrNull(r["channel"]),
    packetsSent: asNumber(r["packets_sent"]),
    timesSeen: asNumber(r["times_seen"]),
  };
}

function isDecoded(input: DecodedEnvelope | OpaqueObservation): input is DecodedEnvelope {
  return "kind" in input;
}

/**
 * SQLite-backed store. better-sqlite3 runs every statement synchronously on
 * the event loop, so each transaction below is atomic against every other
 * caller in the process; SQLite's own locking covers other processes.
 */
export class SqliteStore implements MeshStore {
  private db: Database.Database;
  private fieldStatements = new Map<NodeField, Database.Statement>();
  private stmts: {
    insertPacket: Database.Statement;
    enrichPacket: Database.Statement;
    insertSeen: Database.Statement;
    seenProcessed: Database.Statement;
    markSeenProcessed: Database.Statement;
    ensureNode: Database.Statement;
    touchNode: Database.Statement;
    getTraceroute: Database.Statement;
    putTraceroute: Database.Statement;
  };

  constructor(path = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA);
    this.stmts = {
      insertPacket: this.db.prepare(
        `INSERT OR IGNORE INTO packet (packet_id, from_node_id, to_node_id, portnum, kind, channel, payload, import_time)
         VALUES (@packetId, @fromNodeId, @toNodeId, @portnum, @kind, @channel, @payload, @importTime)`,
      ),
      enrichPacket: this.db.prepare(
        `UPDATE packet SET portnum = @portnum, kind = @kind, payload = @payload
         WHERE packet_id = @packetId AND from_node_id = @fromNodeId AND portnum IS NULL`,
      ),
      insertSeen: this.db.prepare(
        `INSERT OR IGNORE INTO packet_seen
           (packet_id, from_node_id, gateway_node_id, channel, topic, rssi, snr, hop_limit, hop_start, hop_count, rx_time, import_time)
         VALUES (@packetId, @fromNodeId, @gatewayNodeId, @channel, @topic, @rssi, @snr, @hopLimit, @hopStart, @hopCount, @rxTime, @importTime)`,
      ),
      seenProcessed: this.db.prepare(
        `SELECT processed FROM packet_seen WHERE packet_id = ? AND from_node_id = ? AND gateway_node_id = ?`,
      ),
      markSeenProcessed: this.db.prepare(
        `UPDATE packet_seen SET processed = 1 WHERE packet_id = ? AND from_node_id = ? AND gateway_node_id = ?`,
      ),
      ensureNode: this.db.prepare(`INSERT OR IGNORE INTO node (node_id, last_seen) VALUES (?, 0)`),
      touchNode: this.db.prepare(`UPDATE node SET last_seen = MAX(last_seen, ?) WHERE node_id = ?`),
      getTraceroute: this.db.prepare(`SELECT * FROM traceroute WHERE packet_id = ? AND from_node_id = ?`),
      putTraceroute: this.db.prepare(
        `INSERT OR REPLACE INTO traceroute
           (packet_id, from_node_id, to_node_id, route, route_back, snr_towards, snr_back, done, gateway_node_id, import_time, updated_at)
         VALUES (@packetId, @fromNodeId, @toNodeId, @route, @routeBack, @snrTowards, @snrBack, @done, @gatewayNodeId, @importTime, @updatedAt)`,
      ),
    };
    log.debug(`opened ${path}`);
  }

  async recordPacket(input: DecodedEnvelope | OpaqueObservation): Promise<RecordOutcome> {
    return this.db.transaction((): RecordOutcome => {
      const decoded = isDecoded(input);
      const packetRow = {
        packetId: input.packetId,
        fromNodeId: input.fromNodeId,
        toNodeId: input.toNodeId,
        portnum: decoded ? input.portnum : null,
        kind: decoded ? input.kind : "encrypted",
        channel: input.channel,
        payload: decoded ? Buffer.from(input.innerPayload) : null,
        importTime: input.receivedAt,
      };
      const packetCreated = this.stmts.insertPacket.run(packetRow).changes > 0;
      const enriched = !packetCreated && decoded && this.stmts.enrichPacket.run(packetRow).changes > 0;
      const seenCreated =
        this.stmts.insertSeen.run({
          packetId: input.packetId,
          fromNodeId: input.fromNodeId,
          gatewayNodeId: input.gatewayNodeId,
          channel: input.channel,
          topic: input.topic,
          rssi: input.rssi ?? null,
          snr: input.snr ?? null,
          hopLimit: input.hopLimit,
          hopStart: input.hopStart,
          hopCount: input.hopCount,
          rxTime: input.rxTime,
          importTime: input.receivedAt,
        }).changes > 0;
      const pending =
        !seenCreated &&
        asNumber(
          asRecord(this.stmts.seenProcessed.get(input.packetId, input.fromNodeId, input.gatewayNodeId))["processed"],
        ) === 0;
      return { packetCreated, seenCreated, enriched, pending };
    })();
  }

  async markSeenProcessed(packetId: number, fromNodeId: number, gatewayNodeId: string): Promise<void> {
    this.stmts.markSeenProcessed.run(packetId, fromNodeId, gatewayNodeId);
  }

  private fieldStatement(field: NodeField): Database.Statement {
    let stmt = this.fieldStatements.get(field);
    if (!stmt) {
      const { set, at } = fieldAssignment(field);
      stmt = this.db.prepare(
        `UPDATE node SET ${set}, ${at} = @observedAt WHERE node_id = @nodeId AND (${at} IS NULL OR ${at} <= @observedAt)`,
      );
      this.fieldStatements.set(field, stmt);
    }
    return stmt;
  }

  async mergeNodeField(nodeId: number, observation: NodeObservation, observedAt: number): Promise<boolean> {
    const stmt = this.fieldStatement(observation.field);
    return this.db.transaction(() => {
      this.stmts.ensureNode.run(nodeId);
      this.stmts.touchNode.run(observedAt, nodeId);
      return stmt.run({ ...fieldParams(observation), nodeId, observedAt }).changes > 0;
    })();
  }

  async touchNode(nodeId: number, seenAt: number): Promise<void> {
    this.db.transaction(() => {
      this.stmts.ensureNode.run(nodeId);
      this.stmts.touchNode.run(seenAt, nodeId);
    })();
  }

  async updateTraceroute(
    packetId: number,
    fromNodeId: number,
    mutate: TracerouteMutation,
  ): Promise<TracerouteRecord | null> {
    return this.db.transaction((): TracerouteRecord | null => {
      const row = this.stmts.getTraceroute.get(packetId, fromNodeId);
      const existing = row ? toTraceroute(row) : null;
      const next = mutate(existing);
      if (!next) return existing;
      this.stmts.putTraceroute.run({
        packetId: next.packetId,
        fromNodeId: next.fromNodeId,
        toNodeId: next.toNodeId,
        route: JSON.stringify(next.route),
        routeBack: next.routeBack ? JSON.stringify(next.routeBack) : null,
        snrTowards: JSON.stringify(next.snrTowards),
        snrBack: next.snrBack ? JSON.stringify(next.snrBack) : null,
        done: next.done ? 1 : 0,
        gatewayNodeId: next.gatewayNodeId,
        importTime: next.importTime,
        updatedAt: next.updatedAt,
      });
      return next;
    })();
  }

  getNode(nodeId: number): NodeRecord | null {
    const row = this.db.prepare(`SELECT * FROM node WHERE node_id = ?`).get(nodeId);
    return row ? toNode(row) : null;
  }

  listNodes(query: NodeQuery = {}): NodeRecord[] {
    const where: string[] = ["last_seen >= @activeSinceMs"];
    const params: Record<string, number | string> = {
      activeSinceMs: query.activeSinceMs ?? 0,
      limit: query.limit ?? 1000,
    };
    if (query.role !== undefined) {
      where.push("role = @role");
      params.role = query.role;
    }
    if (query.channel !== undefined) {
      where.push("channel = @channel");
      params.channel = query.channel;
    }
    if (query.hwModel !== undefined) {
      where.push("hw_model = @hwModel");
      params.hwModel = query.hwModel;
    }
    return this.db
      .prepare(`SELECT * FROM node WHERE ${where.join(" AND ")} ORDER BY last_seen DESC, node_id ASC LIMIT @limit`)
      .all(params)
      .map(toNode);
  }

  nodeNames(nodeIds: number[]): Map<number, string> {
    const out = new Map<number, string>();
    const unique = Array.from(new Set(nodeIds));
    if (unique.length === 0) return out;
    const placeholders = unique.map(() => "?").join(", ");
    const rows = this.db
      .prepare(`SELECT node_id, long_name FROM node WHERE long_name IS NOT NULL AND node_id IN (${placeholders})`)
      .all(...unique);
    for (const row of rows) {
      const r = asRecord(row);
      const name = asString(r["long_name"]);
      if (name) out.set(asNumber(r["node_id"]), name);
    }
    return out;
  }

  getPacket(packetId: number, fromNodeId: number): PacketRecord | null {
    const row = this.db.prepare(`SELECT * FROM packet WHERE packet_id = ? AND from_node_id = ?`).get(packetId, fromNodeId);
    return row ? toPacket(row) : null;
  }

  listPackets(query: PacketQuery = {}): PacketRecord[] {
    const where: string[] = ["import_time >= @sinceMs"];
    const params: Record<string, number | string> = { sinceMs: query.sinceMs ?? 0, limit: query.limit ?? 500 };
    if (query.packetId !== undefined) {
      where.push("packet_id = @packetId");
      params.packetId = query.packetId;
    }
    if (query.fromNodeId !== undefined) {
      where.push("from_node_id = @fromNodeId");
      params.fromNodeId = query.fromNodeId;
    }
    if (query.toNodeId !== undefined) {
      where.push("to_node_id = @toNodeId");
      params.toNodeId = query.toNodeId;
    }
    if (query.nodeId !== undefined) {
      where.push("(from_node_id = @nodeId OR to_node_id = @nodeId)");
      params.nodeId = query.nodeId;
    }
    if (query.contains !== undefined && query.contains !== "") {
      where.push("kind = 'text' AND instr(CAST(payload AS TEXT), @contains) > 0");
      params.contains = query.contains;
    }
    if (query.portnum !== undefined) {
      where.push("portnum = @portnum");
      params.portnum = query.portnum;
    }
    return this.db
      .prepare(`SELECT * FROM packet WHERE ${where.join(" AND ")} ORDER BY import_time DESC LIMIT @limit`)
      .all(params)
      .map(toPacket);
  }

  listPacketsByPort(portnum: number, sinceMs: number, limit = 500): PacketRecord[] {
    return this.listPackets({ portnum, sinceMs, limit });
  }

  listPacketSeen(packetId: number, fromNodeId: number): PacketSeenRecord[] {
    return this.db
      .prepare(`SELECT * FROM packet_seen WHERE packet_id = ? AND from_node_id = ? ORDER BY import_time, gateway_node_id`)
      .all(packetId, fromNodeId)
      .map(toSeen);
  }

  getTraceroute(packetId: number, fromNodeId: number): TracerouteRecord | null {
    const row = this.stmts.getTraceroute.get(packetId, fromNodeId);
    return row ? toTraceroute(row) : null;
  }

  listTraceroutesSince(sinceMs: number): TracerouteRecord[] {
    return this.db
      .prepare(`SELECT * FROM traceroute WHERE updated_at >= ? ORDER BY updated_at`)
      .all(sinceMs)
      .map(toTraceroute);
  }

  topTraffic(sinceMs: number, limit: number): TrafficRow[] {
    return this.db
      .prepare(
        `SELECT p.from_node_id AS node_id, n.long_name, n.short_name, n.channel,
                COUNT(DISTINCT p.packet_id) AS packets_sent,
                COUNT(ps.gateway_node_id) AS times_seen
         FROM packet p
         LEFT JOIN packet_seen ps ON ps.packet_id = p.packet_id AND ps.from_node_id = p.from_node_id
         LEFT JOIN node n ON n.node_id = p.from_node_id
         WHERE p.import_time >= ?
         GROUP BY p.from_node_id
         ORDER BY times_seen DESC, node_id ASC
         LIMIT ?`,
      )
      .all(sinceMs, limit)
      .map(toTraffic);
  }

  close() {
    this.db.close();
  }
}
