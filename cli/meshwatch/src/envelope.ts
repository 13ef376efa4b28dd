import { channelCipher } from "./crypto.js";
import { DecodeError, UndecryptableError } from "./errors.js";
import { kindForPort } from "./decoders.js";
import { decodeMessage, meshTypes } from "./proto.js";
import { DecodedEnvelope, OpaqueObservation, RawMessage } from "./schema.js";
import { parseTopic, TopicLayout } from "./topic.js";
import { asBytes, asNumber, asRecord } from "./util.js";

export type EnvelopeContext = {
  layout: TopicLayout;
  channelKeys: Buffer[];
  ignoreFromNodes: ReadonlySet<number>;
};

export type EnvelopeOutcome =
  | { type: "decoded"; envelope: DecodedEnvelope }
  | { type: "opaque"; observation: OpaqueObservation; reason: UndecryptableError }
  | { type: "skipped"; reason: "no_packet_id" | "ignored_sender" }
  | { type: "failed"; error: DecodeError };

function openEncrypted(
  encrypted: Uint8Array,
  keys: Buffer[],
  packetId: number,
  fromNodeId: number,
): Record<string, unknown> | null {
  const { Data } = meshTypes();
  for (const key of keys) {
    const plain = channelCipher(encrypted, key, packetId, fromNodeId);
    const res = decodeMessage(Data, plain);
    // A wrong key still yields bytes; only a parse with a real port counts.
    if (res.ok && asNumber(res.value["portnum"]) !== 0) return res.value;
  }
  return null;
}

/**
 * Turns one broker message into a decoded envelope, an opaque observation
 * (encrypted, no key applies) or a counted failure. Stateless, so any number
 * of decode workers may call it concurrently.
 */
export function decodeEnvelope(raw: RawMessage, ctx: EnvelopeContext): EnvelopeOutcome {
  const route = parseTopic(raw.topic, ctx.layout);
  if (!route.ok) return { type: "failed", error: route.error };

  const outer = decodeMessage(meshTypes().ServiceEnvelope, raw.payload, "envelope");
  if (!outer.ok) return { type: "failed", error: outer.error };

  const packetRaw = outer.value["packet"];
  if (!packetRaw) {
    return { type: "failed", error: new DecodeError("envelope", `envelope on ${raw.topic} carries no packet`) };
  }
  const packet = asRecord(packetRaw);
  const packetId = asNumber(packet["id"]);
  if (packetId === 0) return { type: "skipped", reason: "no_packet_id" };
  const fromNodeId = asNumber(packet["from"]);
  if (ctx.ignoreFromNodes.has(fromNodeId)) return { type: "skipped", reason: "ignored_sender" };

  const hopLimit = asNumber(packet["hopLimit"]);
  const hopStart = asNumber(packet["hopStart"]);
  const rssi = asNumber(packet["rxRssi"]);
  const snr = asNumber(packet["rxSnr"]);
  const header = {
    topic: raw.topic,
    packetId,
    fromNodeId,
    toNodeId: asNumber(packet["to"]),
    channel: route.value.channel,
    gatewayNodeId: route.value.gatewayNodeId,
    hopLimit,
    hopStart,
    hopCount: hopStart > 0 ? hopStart - hopLimit : null,
    rxTime: asNumber(packet["rxTime"]),
    rssi: rssi !== 0 ? rssi : undefined,
    snr: rssi !== 0 || snr !== 0 ? snr : undefined,
    receivedAt: raw.receivedAt,
  };

  let data: Record<string, unknown> | null = packet["decoded"] ? asRecord(packet["decoded"]) : null;
  if (!data) {
    const encrypted = asBytes(packet["encrypted"]);
    if (!encrypted || encrypted.length === 0) {
      return { type: "failed", error: new DecodeError("envelope", `packet ${packetId} has neither payload nor ciphertext`) };
    }
    data = openEncrypted(encrypted, ctx.channelKeys, packetId, fromNodeId);
    if (!data) {
      return {
        type: "opaque",
        observation: { ...header, encrypted },
        reason: new UndecryptableError(packetId, fromNodeId),
      };
    }
  }

  const portnum = asNumber(data["portnum"]);
  return {
    type: "decoded",
    envelope: {
      ...header,
      kind: kindForPort(portnum),
      portnum,
      innerPayload: asBytes(data["payload"]) ?? new Uint8Array(0),
      wantResponse: data["wantResponse"] === true,
      requestId: asNumber(data["requestId"]),
    },
  };
}
