import protobuf from "protobufjs";
import type { Type } from "protobufjs";
import { join } from "node:path";
import { DecodeError, DecodeStage, Result } from "./errors.js";
import { findPackageRoot } from "./repo.js";
import { errorMessage } from "./util.js";

export type MeshTypes = {
  ServiceEnvelope: Type;
  MeshPacket: Type;
  Data: Type;
  Position: Type;
  User: Type;
  RouteDiscovery: Type;
  Routing: Type;
  Telemetry: Type;
  NeighborInfo: Type;
  MapReport: Type;
};

let cached: MeshTypes | null = null;

export function meshTypes(): MeshTypes {
  if (cached) return cached;
  const root = protobuf.loadSync(join(findPackageRoot(import.meta.url), "proto", "mesh.proto"));
  const lookup = (name: string) => root.lookupType(`meshtastic.${name}`);
  cached = {
    ServiceEnvelope: lookup("ServiceEnvelope"),
    MeshPacket: lookup("MeshPacket"),
    Data: lookup("Data"),
    Position: lookup("Position"),
    User: lookup("User"),
    RouteDiscovery: lookup("RouteDiscovery"),
    Routing: lookup("Routing"),
    Telemetry: lookup("Telemetry"),
    NeighborInfo: lookup("NeighborInfo"),
    MapReport: lookup("MapReport"),
  };
  return cached;
}

/** Decodes to a plain object; truncated or malformed bytes come back as a DecodeError. */
export function decodeMessage(
  type: Type,
  bytes: Uint8Array,
  stage: DecodeStage = "payload",
): Result<Record<string, unknown>, DecodeError> {
  try {
    const message = type.decode(bytes);
    return { ok: true, value: type.toObject(message, { longs: Number }) };
  } catch (err) {
    return { ok: false, error: new DecodeError(stage, `${type.name}: ${errorMessage(err)}`, { cause: err }) };
  }
}

export function encodeMessage(type: Type, value: Record<string, unknown>): Uint8Array {
  return type.encode(type.fromObject(value)).finish();
}
