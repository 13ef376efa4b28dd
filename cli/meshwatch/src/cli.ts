#!/usr/bin/env node
import { WebSocket } from "ws";
import { ConfigError, loadConfig } from "./config.js";
import { setLogLevel } from "./logger.js";
import { MeshwatchServer } from "./server.js";
import { asNumber, asRecord, asString, errorMessage, nodeIdToHex, safeJsonParse } from "./util.js";

const args = process.argv.slice(2);
const cmd = args[0] ?? "help";

function getArg(flag: string, fallback?: string) {
  const idx = args.indexOf(flag);
  if (idx === -1) return fallback;
  const val = args[idx + 1];
  if (!val || val.startsWith("--")) return fallback;
  return val;
}

function hasFlag(flag: string) {
  return args.includes(flag);
}

function usage(exitCode = 0): never {
  console.log(`meshwatch <command> [options]

Commands:
  start [--config <path>] [--port <port>] [--db <path>] [--mqtt <url>]
  tail [--station <url>] [--kind <kind>]
  top [--station <url>] [--hours <n>] [--limit <n>]

Defaults:
  --config meshwatch.config.json
  --station http://localhost:9200
`);
  process.exit(exitCode);
}

if (hasFlag("--help") || cmd === "--help" || cmd === "help") {
  usage(0);
}

function stationURL() {
  return (getArg("--station") ?? "http://localhost:9200").replace(/\/+$/, "");
}

async function httpJson(path: string): Promise<unknown> {
  const url = `${stationURL()}${path}`;
  const res = await fetch(url);
  if (!res.ok) throw new Error(`HTTP ${res.status}`);
  return res.json();
}

async function cmdStart() {
  const config = loadConfig({
    configPath: getArg("--config"),
    port: getArg("--port"),
    db: getArg("--db"),
    mqtt: getArg("--mqtt"),
  });
  setLogLevel(config.logLevel);
  const server = new MeshwatchServer({ config });
  await server.start();
  console.log(`meshwatch running on http://localhost:${server.port()}`);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`${signal} received, draining`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(errorMessage(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

async function cmdTail() {
  const kind = getArg("--kind");
  const wsURL = stationURL().replace(/^http/, "ws") + "/ws/packets";
  const ws = new WebSocket(wsURL);
  ws.on("message", (data) => {
    const line = String(data);
    if (kind) {
      const parsed = safeJsonParse(line);
      if (!parsed.ok || asRecord(parsed.value)["kind"] !== kind) return;
    }
    process.stdout.write(line + "\n");
  });
  ws.on("close", () => process.exit(0));
  ws.on("error", (err) => {
    console.error(err.message);
    process.exit(2);
  });
}

async function cmdTop() {
  const hours = getArg("--hours", "24");
  const limit = getArg("--limit", "50");
  const body = asRecord(await httpJson(`/api/top?hours=${hours}&limit=${limit}`));
  const rows = Array.isArray(body["nodes"]) ? body["nodes"] : [];
  console.log(`${"node".padEnd(10)} ${"name".padEnd(24)} ${"channel".padEnd(10)} ${"sent".padStart(6)} ${"seen".padStart(6)}`);
  for (const item of rows) {
    const row = asRecord(item);
    const name = asString(row["longName"]) ?? asString(row["shortName"]) ?? "";
    console.log(
      `${nodeIdToHex(asNumber(row["nodeId"])).padEnd(10)} ${name.slice(0, 24).padEnd(24)} ${(asString(row["channel"]) ?? "").padEnd(10)} ${String(asNumber(row["packetsSent"])).padStart(6)} ${String(asNumber(row["timesSeen"])).padStart(6)}`,
    );
  }
}

try {
  if (cmd === "start") {
    await cmdStart();
  } else if (cmd === "tail") {
    await cmdTail();
  } else if (cmd === "top") {
    await cmdTop();
  } else {
    usage(1);
  }
} catch (err) {
  console.error(err instanceof ConfigError ? err.message : `meshwatch ${cmd}: ${errorMessage(err)}`);
  process.exit(1);
}
