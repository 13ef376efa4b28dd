import { channelCipher, parseChannelKey, DEFAULT_CHANNEL_KEY } from "./crypto.js";
import { PortNum } from "./decoders.js";
import { EnvelopeContext } from "./envelope.js";
import { encodeMessage, meshTypes } from "./proto.js";
import { DecodedEnvelope, OpaqueObservation, RawMessage } from "./schema.js";
import { compileTopicLayout, DEFAULT_TOPIC_LAYOUT } from "./topic.js";

export const RECEIVED_AT = 1_700_000_000_000;

export function defaultKey(): Buffer {
  const key = parseChannelKey(DEFAULT_CHANNEL_KEY);
  if (!key) throw new Error("default channel key did not parse");
  return key;
}

export function testContext(channelKeys: Buffer[] = [defaultKey()], ignore: number[] = []): EnvelopeContext {
  return {
    layout: compileTopicLayout(DEFAULT_TOPIC_LAYOUT),
    channelKeys,
    ignoreFromNodes: new Set(ignore),
  };
}

export function positionPayload(lat: number, lon: number, altitude?: number): Uint8Array {
  const value: Record<string, unknown> = { latitudeI: Math.round(lat * 1e7), longitudeI: Math.round(lon * 1e7) };
  if (altitude !== undefined) value.altitude = altitude;
  return encodeMessage(meshTypes().Position, value);
}

export function userPayload(longName: string, shortName: string, hwModel = 9, role = 0): Uint8Array {
  return encodeMessage(meshTypes().User, { id: "!0000002a", longName, shortName, hwModel, role });
}

export function tracePayload(route: number[], routeBack: number[] = [], snrTowards: number[] = [], snrBack: number[] = []) {
  return encodeMessage(meshTypes().RouteDiscovery, { route, routeBack, snrTowards, snrBack });
}

export function routeReplyPayload(route: number[], routeBack: number[] = []): Uint8Array {
  return encodeMessage(meshTypes().Routing, { routeReply: { route, routeBack } });
}

export function neighborPayload(nodeId: number, neighbors: number[]): Uint8Array {
  return encodeMessage(meshTypes().NeighborInfo, {
    nodeId,
    neighbors: neighbors.map((id) => ({ nodeId: id, snr: 4 })),
  });
}

export type PacketFixture = {
  packetId: number;
  from: number;
  to?: number;
  portnum?: number;
  payload?: Uint8Array;
  wantResponse?: boolean;
  requestId?: number;
  hopLimit?: number;
  hopStart?: number;
  rxTime?: number;
  rxRssi?: number;
  rxSnr?: number;
};

function dataMessage(opts: PacketFixture): Record<string, unknown> {
  return {
    portnum: opts.portnum ?? PortNum.POSITION_APP,
    payload: opts.payload ?? new Uint8Array(0),
    wantResponse: opts.wantResponse ?? false,
    requestId: opts.requestId ?? 0,
  };
}

function packetMessage(opts: PacketFixture): Record<string, unknown> {
  return {
    from: opts.from,
    to: opts.to ?? 0xffffffff,
    id: opts.packetId,
    hopLimit: opts.hopLimit ?? 0,
    hopStart: opts.hopStart ?? 0,
    rxTime: opts.rxTime ?? 0,
    rxRssi: opts.rxRssi ?? 0,
    rxSnr: opts.rxSnr ?? 0,
  };
}

export function envelopeBytes(opts: PacketFixture): Uint8Array {
  return encodeMessage(meshTypes().ServiceEnvelope, {
    packet: { ...packetMessage(opts), decoded: dataMessage(opts) },
    channelId: "LongFast",
    gatewayId: "!00000001",
  });
}

export function encryptedEnvelopeBytes(opts: PacketFixture, key: Buffer = defaultKey()): Uint8Array {
  const plain = encodeMessage(meshTypes().Data, dataMessage(opts));
  return encodeMessage(meshTypes().ServiceEnvelope, {
    packet: { ...packetMessage(opts), encrypted: channelCipher(plain, key, opts.packetId, opts.from) },
    channelId: "LongFast",
    gatewayId: "!00000001",
  });
}

export function rawMessage(topic: string, payload: Uint8Array, receivedAt = RECEIVED_AT): RawMessage {
  return { topic, payload, receivedAt };
}

export function decodedEnvelope(overrides: Partial<DecodedEnvelope> = {}): DecodedEnvelope {
  return {
    topic: "region/sub/gatewayA/1234",
    packetId: 77,
    fromNodeId: 42,
    toNodeId: 0xffffffff,
    channel: "1234",
    gatewayNodeId: "gatewayA",
    hopLimit: 3,
    hopStart: 3,
    hopCount: 0,
    rxTime: 0,
    receivedAt: RECEIVED_AT,
    kind: "position",
    portnum: PortNum.POSITION_APP,
    innerPayload: positionPayload(37, -122),
    wantResponse: false,
    requestId: 0,
    ...overrides,
  };
}

export function opaqueObservation(overrides: Partial<OpaqueObservation> = {}): OpaqueObservation {
  return {
    topic: "region/sub/gatewayA/1234",
    packetId: 77,
    fromNodeId: 42,
    toNodeId: 0xffffffff,
    channel: "1234",
    gatewayNodeId: "gatewayA",
    hopLimit: 3,
    hopStart: 3,
    hopCount: 0,
    rxTime: 0,
    receivedAt: RECEIVED_AT,
    encrypted: new Uint8Array([1, 2, 3, 4]),
    ...overrides,
  };
}
