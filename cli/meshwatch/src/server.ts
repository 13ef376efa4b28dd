import http from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { buildEdges, EdgeFilter, topTraffic } from "./aggregators.js";
import { MeshwatchConfig } from "./config.js";
import { parseChannelKey } from "./crypto.js";
import { LiveHub, Subscription } from "./live-hub.js";
import { BrokerFactory, Listener, mqttBrokerFactory } from "./listener.js";
import { createLogger } from "./logger.js";
import { Metrics } from "./metrics.js";
import { Pipeline } from "./pipeline.js";
import { PacketRecord } from "./schema.js";
import { SqliteStore } from "./sqlite-store.js";
import { MeshStore } from "./store.js";
import { compileTopicLayout } from "./topic.js";
import { errorMessage, nowMs, parseNodeRef } from "./util.js";

const log = createLogger("server");

const HOUR_MS = 60 * 60 * 1000;

export type ServerOptions = {
  config: MeshwatchConfig;
  store?: MeshStore;
  brokerFactory?: BrokerFactory;
};

function packetJson(packet: PacketRecord) {
  return { ...packet, payload: packet.payload ? Buffer.from(packet.payload).toString("base64") : null };
}

function intParam(url: URL, name: string, fallback: number, max: number): number {
  const raw = url.searchParams.get(name);
  if (raw === null) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return Math.min(Math.floor(n), max);
}

function textParam(url: URL, name: string): string | undefined {
  const raw = url.searchParams.get(name);
  return raw !== null && raw !== "" ? raw : undefined;
}

/** Null for a malformed percent escape. */
function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) return null;
    throw err;
  }
}

type NodeParams = { ok: true; ids: Record<string, number | undefined> } | { ok: false };

function nodeParams(url: URL, names: string[]): NodeParams {
  const ids: Record<string, number | undefined> = {};
  for (const name of names) {
    const raw = url.searchParams.get(name);
    if (raw === null) continue;
    const id = parseNodeRef(raw);
    if (id === null) return { ok: false };
    ids[name] = id;
  }
  return { ok: true, ids };
}

export class MeshwatchServer {
  readonly metrics = new Metrics();
  readonly hub: LiveHub;
  readonly store: MeshStore;
  readonly listener: Listener;
  readonly pipeline: Pipeline;
  private startedAt = nowMs();
  private server?: http.Server;
  private wssPackets?: WebSocketServer;
  private packetClients = new Map<WebSocket, Subscription>();

  constructor(private options: ServerOptions) {
    const { config } = options;
    this.store = options.store ?? new SqliteStore(config.database.path);
    this.hub = new LiveHub(this.metrics, config.live.queueCapacity);
    this.listener = new Listener(
      {
        topics: config.mqtt.topics,
        queueCapacity: config.pipeline.rawQueueCapacity,
        reconnectMinMs: config.mqtt.reconnectMinMs,
        reconnectMaxMs: config.mqtt.reconnectMaxMs,
      },
      options.brokerFactory ??
        mqttBrokerFactory({
          url: config.mqtt.url,
          username: config.mqtt.username,
          password: config.mqtt.password,
          clientId: config.mqtt.clientId,
        }),
      this.metrics,
    );
    const channelKeys: Buffer[] = [];
    for (const key of config.channelKeys) {
      const parsed = parseChannelKey(key);
      if (parsed) channelKeys.push(parsed);
    }
    this.pipeline = new Pipeline(this.listener.messages, this.store, this.hub, this.metrics, {
      envelope: {
        layout: compileTopicLayout(config.mqtt.topicLayout),
        channelKeys,
        ignoreFromNodes: new Set(config.ignoreFromNodes),
      },
      decodeWorkers: config.pipeline.decodeWorkers,
      storeWorkers: config.pipeline.storeWorkers,
      decodedQueueCapacity: config.pipeline.decodedQueueCapacity,
      retry: {
        timeoutMs: config.pipeline.storeTimeoutMs,
        attempts: config.pipeline.storeAttempts,
        backoffMs: config.pipeline.storeBackoffMs,
      },
    });
  }

  async start(): Promise<void> {
    this.server = http.createServer(this.handleRequest.bind(this));
    this.wssPackets = new WebSocketServer({ noServer: true });

    this.server.on("upgrade", (req, socket, head) => {
      const url = req.url ?? "";
      if (url.startsWith("/ws/packets")) {
        this.wssPackets?.handleUpgrade(req, socket, head, (ws) => this.attachPacketClient(ws));
        return;
      }
      socket.destroy();
    });

    const server = this.server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.options.config.server.port, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.pipeline.start();
    this.listener.start();
    log.info(`listening on :${this.port()}`);
  }

  port(): number {
    const address = this.server?.address();
    return address && typeof address === "object" ? address.port : 0;
  }

  async stop(): Promise<void> {
    await this.listener.stop();
    await this.pipeline.stop();
    this.hub.close();
    for (const ws of this.packetClients.keys()) ws.close();
    this.wssPackets?.close();
    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    this.store.close();
  }

  private attachPacketClient(ws: WebSocket) {
    const sub = this.hub.subscribe();
    this.packetClients.set(ws, sub);
    ws.on("close", () => {
      this.packetClients.delete(ws);
      this.hub.unsubscribe(sub);
    });
    this.pumpPackets(ws, sub).catch((err: unknown) => {
      log.warn(`live client ${sub.id}: ${errorMessage(err)}`);
      this.hub.unsubscribe(sub);
      ws.terminate();
    });
  }

  private async pumpPackets(ws: WebSocket, sub: Subscription) {
    for await (const event of sub) {
      if (ws.readyState !== WebSocket.OPEN) break;
      await new Promise<void>((resolve, reject) =>
        ws.send(JSON.stringify(event), (err) => (err ? reject(err) : resolve())),
      );
    }
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    try {
      this.route(url, res);
    } catch (err) {
      log.error(`${url.pathname}: ${errorMessage(err)}`);
      this.respondJson(res, { ok: false, error: "internal_error" }, 500);
    }
  }

  private route(url: URL, res: http.ServerResponse) {
    if (url.pathname === "/health") {
      const snapshot = this.metrics.snapshot();
      return this.respondJson(res, {
        ok: snapshot.status === "ok",
        uptime_ms: nowMs() - this.startedAt,
        subscribers: this.hub.subscriberCount,
        raw_queue: this.listener.messages.size,
        decoded_queue: this.pipeline.decoded.size,
        ...snapshot,
      });
    }
    if (url.pathname === "/api/nodes") {
      const days = intParam(url, "days_active", 0, 365);
      const hours = days > 0 ? days * 24 : intParam(url, "hours", 0, 24 * 365);
      const nodes = this.store.listNodes({
        activeSinceMs: hours > 0 ? nowMs() - hours * HOUR_MS : 0,
        role: textParam(url, "role"),
        channel: textParam(url, "channel"),
        hwModel: textParam(url, "hw_model"),
        limit: intParam(url, "limit", 1000, 10_000),
      });
      return this.respondJson(res, { nodes });
    }
    const nodeMatch = url.pathname.match(/^\/api\/nodes\/([^/]+)$/);
    if (nodeMatch) {
      const segment = decodeSegment(nodeMatch[1]);
      if (segment === null) return this.respondJson(res, { ok: false, error: "bad_node_id" }, 400);
      const nodeId = parseNodeRef(segment);
      const node = nodeId !== null ? this.store.getNode(nodeId) : null;
      if (!node) return this.respondJson(res, { ok: false, error: "node_not_found" }, 404);
      return this.respondJson(res, node);
    }
    if (url.pathname === "/api/packets") {
      const nodes = nodeParams(url, ["from", "to", "node"]);
      if (!nodes.ok) return this.respondJson(res, { ok: false, error: "bad_node_id" }, 400);
      const portnum = url.searchParams.get("portnum");
      const packetId = url.searchParams.get("packet_id");
      const hours = intParam(url, "hours", 24, 24 * 30);
      const packets = this.store.listPackets({
        packetId: packetId !== null && /^\d+$/.test(packetId) ? Number(packetId) : undefined,
        fromNodeId: nodes.ids["from"],
        toNodeId: nodes.ids["to"],
        nodeId: nodes.ids["node"],
        portnum: portnum !== null && /^\d+$/.test(portnum) ? Number(portnum) : undefined,
        contains: textParam(url, "contains"),
        sinceMs: nowMs() - hours * HOUR_MS,
        limit: intParam(url, "limit", 200, 5000),
      });
      return this.respondJson(res, { packets: packets.map(packetJson) });
    }
    const seenMatch = url.pathname.match(/^\/api\/packets\/([^/]+)\/(\d+)\/seen$/);
    if (seenMatch) {
      const segment = decodeSegment(seenMatch[1]);
      const fromNodeId = segment !== null ? parseNodeRef(segment) : null;
      if (fromNodeId === null) return this.respondJson(res, { ok: false, error: "bad_node_id" }, 400);
      const packetId = Number(seenMatch[2]);
      const packet = this.store.getPacket(packetId, fromNodeId);
      if (!packet) return this.respondJson(res, { ok: false, error: "packet_not_found" }, 404);
      return this.respondJson(res, {
        packet: packetJson(packet),
        seen: this.store.listPacketSeen(packetId, fromNodeId),
      });
    }
    const traceMatch = url.pathname.match(/^\/api\/traceroutes\/([^/]+)\/(\d+)$/);
    if (traceMatch) {
      const segment = decodeSegment(traceMatch[1]);
      if (segment === null) return this.respondJson(res, { ok: false, error: "bad_node_id" }, 400);
      const fromNodeId = parseNodeRef(segment);
      const record = fromNodeId !== null ? this.store.getTraceroute(Number(traceMatch[2]), fromNodeId) : null;
      if (!record) return this.respondJson(res, { ok: false, error: "traceroute_not_found" }, 404);
      return this.respondJson(res, record);
    }
    if (url.pathname === "/api/edges") {
      const type = url.searchParams.get("type") ?? "all";
      if (type !== "trace" && type !== "neighbor" && type !== "all") {
        return this.respondJson(res, { ok: false, error: "bad_edge_type" }, 400);
      }
      const filter: EdgeFilter = type;
      const hours = intParam(url, "hours", 48, 24 * 30);
      return this.respondJson(res, { edges: buildEdges(this.store, nowMs() - hours * HOUR_MS, filter) });
    }
    if (url.pathname === "/api/top") {
      const hours = intParam(url, "hours", 24, 24 * 30);
      const limit = intParam(url, "limit", 50, 1000);
      return this.respondJson(res, { nodes: topTraffic(this.store, nowMs() - hours * HOUR_MS, limit) });
    }
    return this.respondJson(res, { ok: false, error: "not_found" }, 404);
  }

  private respondJson(res: http.ServerResponse, payload: unknown, status = 200) {
    const body = JSON.stringify(payload);
    res.writeHead(status, {
      "Content-Type": "application/json",
      "Access-Control-Allow-Origin": "*",
      "Cache-Control": "no-store",
    });
    res.end(body);
  }
}
