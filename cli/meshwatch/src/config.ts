import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { DEFAULT_CHANNEL_KEY } from "./crypto.js";
import { isLogLevel, LogLevel } from "./logger.js";
import { DEFAULT_TOPIC_LAYOUT } from "./topic.js";
import { asRecord, isRecord, safeJsonParse } from "./util.js";

export type MeshwatchConfig = {
  mqtt: {
    url: string;
    username?: string;
    password?: string;
    clientId?: string;
    topics: string[];
    topicLayout: string;
    reconnectMinMs: number;
    reconnectMaxMs: number;
  };
  channelKeys: string[];
  ignoreFromNodes: number[];
  database: { path: string };
  pipeline: {
    rawQueueCapacity: number;
    decodedQueueCapacity: number;
    decodeWorkers: number;
    storeWorkers: number;
    storeTimeoutMs: number;
    storeAttempts: number;
    storeBackoffMs: number;
  };
  live: { queueCapacity: number };
  server: { port: number };
  logLevel: LogLevel;
};

export const DEFAULT_CONFIG_FILE = "meshwatch.config.json";

export function defaultConfig(): MeshwatchConfig {
  return {
    mqtt: {
      url: "mqtt://localhost:1883",
      topics: ["msh/#"],
      topicLayout: DEFAULT_TOPIC_LAYOUT,
      reconnectMinMs: 1000,
      reconnectMaxMs: 30_000,
    },
    channelKeys: [DEFAULT_CHANNEL_KEY],
    ignoreFromNodes: [],
    database: { path: "meshwatch.db" },
    pipeline: {
      rawQueueCapacity: 1000,
      decodedQueueCapacity: 500,
      decodeWorkers: 2,
      storeWorkers: 2,
      storeTimeoutMs: 5000,
      storeAttempts: 3,
      storeBackoffMs: 200,
    },
    live: { queueCapacity: 100 },
    server: { port: 9200 },
    logLevel: "info",
  };
}

export class ConfigError extends Error {
  constructor(readonly key: string, message: string) {
    super(`config ${key}: ${message}`);
    this.name = "ConfigError";
  }
}

export type ConfigOverrides = {
  configPath?: string;
  port?: string;
  db?: string;
  mqtt?: string;
};

type Section = Record<string, unknown>;

function section(raw: Section, key: string): Section {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ConfigError(key, "must be an object");
  return value;
}

function str(raw: Section, key: string, path: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string" || value === "") throw new ConfigError(path, "must be a non-empty string");
  return value;
}

function optStr(raw: Section, key: string, path: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new ConfigError(path, "must be a string");
  return value;
}

function int(raw: Section, key: string, path: string, fallback: number, min = 1): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(path, `must be an integer >= ${min}`);
  }
  return value;
}

function strList(raw: Section, key: string, path: string, fallback: string[]): string[] {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || value.some((v) => typeof v !== "string")) {
    throw new ConfigError(path, "must be an array of strings");
  }
  return value.map(String);
}

function nodeList(raw: Section, key: string, path: string): number[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new ConfigError(path, "must be an array of node numbers");
  return value.map((v) => {
    if (typeof v !== "number" || !Number.isInteger(v) || v < 0) {
      throw new ConfigError(path, "must be an array of node numbers");
    }
    return v;
  });
}

/** Validates a parsed config document over the defaults. */
export function parseConfig(input: unknown): MeshwatchConfig {
  const d = defaultConfig();
  if (input !== undefined && !isRecord(input)) throw new ConfigError("(root)", "must be an object");
  const raw = asRecord(input);
  const mqtt = section(raw, "mqtt");
  const database = section(raw, "database");
  const pipeline = section(raw, "pipeline");
  const live = section(raw, "live");
  const server = section(raw, "server");
  const logLevel = raw["logLevel"] ?? d.logLevel;
  if (!isLogLevel(logLevel)) throw new ConfigError("logLevel", "must be one of debug, info, warn, error");

  const config: MeshwatchConfig = {
    mqtt: {
      url: str(mqtt, "url", "mqtt.url", d.mqtt.url),
      username: optStr(mqtt, "username", "mqtt.username"),
      password: optStr(mqtt, "password", "mqtt.password"),
      clientId: optStr(mqtt, "clientId", "mqtt.clientId"),
      topics: strList(mqtt, "topics", "mqtt.topics", d.mqtt.topics),
      topicLayout: str(mqtt, "topicLayout", "mqtt.topicLayout", d.mqtt.topicLayout),
      reconnectMinMs: int(mqtt, "reconnectMinMs", "mqtt.reconnectMinMs", d.mqtt.reconnectMinMs),
      reconnectMaxMs: int(mqtt, "reconnectMaxMs", "mqtt.reconnectMaxMs", d.mqtt.reconnectMaxMs),
    },
    channelKeys: strList(raw, "channelKeys", "channelKeys", d.channelKeys),
    ignoreFromNodes: nodeList(raw, "ignoreFromNodes", "ignoreFromNodes"),
    database: { path: str(database, "path", "database.path", d.database.path) },
    pipeline: {
      rawQueueCapacity: int(pipeline, "rawQueueCapacity", "pipeline.rawQueueCapacity", d.pipeline.rawQueueCapacity),
      decodedQueueCapacity: int(
        pipeline,
        "decodedQueueCapacity",
        "pipeline.decodedQueueCapacity",
        d.pipeline.decodedQueueCapacity,
      ),
      decodeWorkers: int(pipeline, "decodeWorkers", "pipeline.decodeWorkers", d.pipeline.decodeWorkers),
      storeWorkers: int(pipeline, "storeWorkers", "pipeline.storeWorkers", d.pipeline.storeWorkers),
      storeTimeoutMs: int(pipeline, "storeTimeoutMs", "pipeline.storeTimeoutMs", d.pipeline.storeTimeoutMs),
      storeAttempts: int(pipeline, "storeAttempts", "pipeline.storeAttempts", d.pipeline.storeAttempts),
      storeBackoffMs: int(pipeline, "storeBackoffMs", "pipeline.storeBackoffMs", d.pipeline.storeBackoffMs, 0),
    },
    live: { queueCapacity: int(live, "queueCapacity", "live.queueCapacity", d.live.queueCapacity) },
    server: { port: int(server, "port", "server.port", d.server.port, 0) },
    logLevel,
  };
  if (config.mqtt.topics.length === 0) throw new ConfigError("mqtt.topics", "must name at least one topic filter");
  if (config.mqtt.reconnectMaxMs < config.mqtt.reconnectMinMs) {
    throw new ConfigError("mqtt.reconnectMaxMs", "must not be below mqtt.reconnectMinMs");
  }
  return config;
}

function parsePort(value: string, key: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new ConfigError(key, `invalid port "${value}"`);
  return port;
}

/**
 * Defaults, then the JSON file, then MESHWATCH_* environment variables,
 * then command-line flags. A missing default file is fine; a missing file
 * named with --config is not.
 */
export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): MeshwatchConfig {
  const path = resolve(overrides.configPath ?? DEFAULT_CONFIG_FILE);
  let document: unknown = undefined;
  if (existsSync(path)) {
    const parsed = safeJsonParse(readFileSync(path, "utf8"));
    if (!parsed.ok) throw new ConfigError(path, `invalid JSON: ${parsed.error}`);
    document = parsed.value;
  } else if (overrides.configPath) {
    throw new ConfigError(path, "file not found");
  }
  const config = parseConfig(document);

  if (env.MESHWATCH_MQTT_URL) config.mqtt.url = env.MESHWATCH_MQTT_URL;
  if (env.MESHWATCH_MQTT_USERNAME) config.mqtt.username = env.MESHWATCH_MQTT_USERNAME;
  if (env.MESHWATCH_MQTT_PASSWORD) config.mqtt.password = env.MESHWATCH_MQTT_PASSWORD;
  if (env.MESHWATCH_DB_PATH) config.database.path = env.MESHWATCH_DB_PATH;
  if (env.MESHWATCH_PORT) config.server.port = parsePort(env.MESHWATCH_PORT, "MESHWATCH_PORT");
  if (env.MESHWATCH_LOG_LEVEL) {
    if (!isLogLevel(env.MESHWATCH_LOG_LEVEL)) throw new ConfigError("MESHWATCH_LOG_LEVEL", "unknown level");
    config.logLevel = env.MESHWATCH_LOG_LEVEL;
  }

  if (overrides.mqtt) config.mqtt.url = overrides.mqtt;
  if (overrides.db) config.database.path = overrides.db;
  if (overrides.port) config.server.port = parsePort(overrides.port, "--port");
  return config;
}
