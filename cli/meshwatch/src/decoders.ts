import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { DecodeError, Result } from "./errors.js";
import { decodeMessage, meshTypes } from "./proto.js";
import { findPackageRoot } from "./repo.js";
import { MeshRecord, MessageKind, Neighbor, Position, RouteTrace, TelemetryReading } from "./schema.js";
import { asNumber, asNumberArray, asRecord, asString } from "./util.js";

export const PortNum = {
  TEXT_MESSAGE_APP: 1,
  POSITION_APP: 3,
  NODEINFO_APP: 4,
  ROUTING_APP: 5,
  TELEMETRY_APP: 67,
  TRACEROUTE_APP: 70,
  NEIGHBORINFO_APP: 71,
  MAP_REPORT_APP: 73,
} as const;

const KIND_BY_PORT: Record<number, MessageKind> = {
  [PortNum.TEXT_MESSAGE_APP]: "text",
  [PortNum.POSITION_APP]: "position",
  [PortNum.NODEINFO_APP]: "nodeinfo",
  [PortNum.ROUTING_APP]: "routing",
  [PortNum.TELEMETRY_APP]: "telemetry",
  [PortNum.TRACEROUTE_APP]: "traceroute",
  [PortNum.NEIGHBORINFO_APP]: "neighborinfo",
  [PortNum.MAP_REPORT_APP]: "map_report",
};

export function kindForPort(portnum: number): MessageKind {
  return KIND_BY_PORT[portnum] ?? "unknown";
}

const ROLES = [
  "CLIENT",
  "CLIENT_MUTE",
  "ROUTER",
  "ROUTER_CLIENT",
  "REPEATER",
  "TRACKER",
  "SENSOR",
  "TAK",
  "CLIENT_HIDDEN",
  "LOST_AND_FOUND",
  "TAK_TRACKER",
  "ROUTER_LATE",
];

const ROUTING_ERRORS: Record<number, string> = {
  0: "NONE",
  1: "NO_ROUTE",
  2: "GOT_NAK",
  3: "TIMEOUT",
  4: "NO_INTERFACE",
  5: "MAX_RETRANSMIT",
  6: "NO_CHANNEL",
  7: "TOO_LARGE",
  8: "NO_RESPONSE",
  9: "DUTY_CYCLE_LIMIT",
  32: "BAD_REQUEST",
  33: "NOT_AUTHORIZED",
  34: "PKI_FAILED",
  35: "PKI_UNKNOWN_PUBKEY",
};

let hardwareModels: Record<string, string> | null = null;

function loadHardwareModels(): Record<string, string> {
  if (hardwareModels) return hardwareModels;
  const path = join(findPackageRoot(import.meta.url), "data", "hardware-models.json");
  const out: Record<string, string> = {};
  if (existsSync(path)) {
    const parsed = asRecord(JSON.parse(readFileSync(path, "utf8")));
    for (const [key, value] of Object.entries(parsed)) {
      const name = asString(value);
      if (name) out[key] = name;
    }
  }
  hardwareModels = out;
  return out;
}

export function hardwareModelName(value: number): string {
  return loadHardwareModels()[String(value)] ?? "UNKNOWN";
}

export function roleName(value: number): string {
  return ROLES[value] ?? "UNKNOWN";
}

// Latitude/longitude travel as degrees * 1e7. Zero on both axes means no fix.
function toPosition(raw: Record<string, unknown>, latKey: string, lonKey: string): Position | null {
  const latI = asNumber(raw[latKey]);
  const lonI = asNumber(raw[lonKey]);
  if (latI === 0 && lonI === 0) return null;
  const alt = raw["altitude"];
  return {
    lat: latI / 1e7,
    lon: lonI / 1e7,
    alt: typeof alt === "number" ? alt : null,
  };
}

function toTrace(raw: Record<string, unknown>): RouteTrace {
  return {
    route: asNumberArray(raw["route"]),
    snrTowards: asNumberArray(raw["snrTowards"]).map((v) => v / 4),
    routeBack: asNumberArray(raw["routeBack"]),
    snrBack: asNumberArray(raw["snrBack"]).map((v) => v / 4),
  };
}

export const DEVICE_METRIC_KEYS = [
  "batteryLevel",
  "voltage",
  "channelUtilization",
  "airUtilTx",
  "uptimeSeconds",
] as const;

export const ENVIRONMENT_METRIC_KEYS = ["temperature", "relativeHumidity", "barometricPressure", "iaq"] as const;

export function pickMetrics<K extends string>(raw: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const v = raw[key];
    if (typeof v === "number" && Number.isFinite(v)) out[key] = v;
  }
  return out;
}

function decodeText(bytes: Uint8Array): Result<MeshRecord, DecodeError> {
  try {
    const text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    return { ok: true, value: { kind: "text", text } };
  } catch (err) {
    return { ok: false, error: new DecodeError("payload", "text payload is not valid UTF-8", { cause: err }) };
  }
}

/**
 * Decodes one inner payload by kind. Never throws: truncation and garbage
 * come back as DecodeError, and fields this build does not know are skipped.
 */
export function decodeRecord(kind: MessageKind, portnum: number, bytes: Uint8Array): Result<MeshRecord, DecodeError> {
  const types = meshTypes();
  switch (kind) {
    case "text":
      return decodeText(bytes);
    case "position": {
      const res = decodeMessage(types.Position, bytes);
      if (!res.ok) return res;
      return {
        ok: true,
        value: { kind: "position", position: toPosition(res.value, "latitudeI", "longitudeI"), time: asNumber(res.value["time"]) },
      };
    }
    case "nodeinfo": {
      const res = decodeMessage(types.User, bytes);
      if (!res.ok) return res;
      const user = res.value;
      return {
        ok: true,
        value: {
          kind: "nodeinfo",
          userId: asString(user["id"]) ?? "",
          longName: asString(user["longName"]) ?? "",
          shortName: asString(user["shortName"]) ?? "",
          hwModel: hardwareModelName(asNumber(user["hwModel"])),
          role: roleName(asNumber(user["role"])),
        },
      };
    }
    case "routing": {
      const res = decodeMessage(types.Routing, bytes);
      if (!res.ok) return res;
      const discovery = res.value["routeReply"] ?? res.value["routeRequest"];
      const errorCode = asNumber(res.value["errorReason"]);
      return {
        ok: true,
        value: {
          kind: "routing",
          errorReason: ROUTING_ERRORS[errorCode] ?? `ERROR_${errorCode}`,
          trace: discovery ? toTrace(asRecord(discovery)) : null,
        },
      };
    }
    case "telemetry": {
      const res = decodeMessage(types.Telemetry, bytes);
      if (!res.ok) return res;
      const telemetry: TelemetryReading = { time: asNumber(res.value["time"]) };
      if (res.value["deviceMetrics"]) {
        telemetry.device = pickMetrics(asRecord(res.value["deviceMetrics"]), DEVICE_METRIC_KEYS);
      }
      if (res.value["environmentMetrics"]) {
        telemetry.environment = pickMetrics(asRecord(res.value["environmentMetrics"]), ENVIRONMENT_METRIC_KEYS);
      }
      return { ok: true, value: { kind: "telemetry", telemetry } };
    }
    case "traceroute": {
      const res = decodeMessage(types.RouteDiscovery, bytes);
      if (!res.ok) return res;
      return { ok: true, value: { kind: "traceroute", trace: toTrace(res.value) } };
    }
    case "neighborinfo": {
      const res = decodeMessage(types.NeighborInfo, bytes);
      if (!res.ok) return res;
      const rawNeighbors = res.value["neighbors"];
      const neighbors: Neighbor[] = Array.isArray(rawNeighbors)
        ? rawNeighbors.map((n) => {
            const rec = asRecord(n);
            return { nodeId: asNumber(rec["nodeId"]), snr: asNumber(rec["snr"]) };
          })
        : [];
      return { ok: true, value: { kind: "neighborinfo", nodeId: asNumber(res.value["nodeId"]), neighbors } };
    }
    case "map_report": {
      const res = decodeMessage(types.MapReport, bytes);
      if (!res.ok) return res;
      const report = res.value;
      return {
        ok: true,
        value: {
          kind: "map_report",
          longName: asString(report["longName"]) ?? "",
          shortName: asString(report["shortName"]) ?? "",
          hwModel: hardwareModelName(asNumber(report["hwModel"])),
          role: roleName(asNumber(report["role"])),
          firmware: asString(report["firmwareVersion"]) ?? "",
          position: toPosition(report, "latitudeI", "longitudeI"),
        },
      };
    }
    case "unknown":
      return { ok: true, value: { kind: "unknown", portnum } };
  }
}
