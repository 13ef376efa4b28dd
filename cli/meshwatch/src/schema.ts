export type RawMessage = {
  topic: string;
  payload: Uint8Array;
  receivedAt: number;
};

export type TopicRoute = {
  gatewayNodeId: string;
  channel: string;
};

export type MessageKind =
  | "text"
  | "position"
  | "nodeinfo"
  | "routing"
  | "telemetry"
  | "traceroute"
  | "neighborinfo"
  | "map_report"
  | "unknown";

type PacketHeader = {
  topic: string;
  packetId: number;
  fromNodeId: number;
  toNodeId: number;
  channel: string;
  gatewayNodeId: string;
  hopLimit: number;
  hopStart: number;
  hopCount: number | null;
  rxTime: number;
  rssi?: number;
  snr?: number;
  receivedAt: number;
};

export type DecodedEnvelope = PacketHeader & {
  kind: MessageKind;
  portnum: number;
  innerPayload: Uint8Array;
  wantResponse: boolean;
  requestId: number;
};

// Encrypted packet no configured key could open. Recorded, never decoded.
export type OpaqueObservation = PacketHeader & {
  encrypted: Uint8Array;
};

export type Position = {
  lat: number;
  lon: number;
  alt: number | null;
};

export type DeviceMetrics = {
  batteryLevel?: number;
  voltage?: number;
  channelUtilization?: number;
  airUtilTx?: number;
  uptimeSeconds?: number;
};

export type EnvironmentMetrics = {
  temperature?: number;
  relativeHumidity?: number;
  barometricPressure?: number;
  iaq?: number;
};

export type TelemetryReading = {
  time: number;
  device?: DeviceMetrics;
  environment?: EnvironmentMetrics;
};

export type RouteTrace = {
  route: number[];
  snrTowards: number[];
  routeBack: number[];
  snrBack: number[];
};

export type Neighbor = {
  nodeId: number;
  snr: number;
};

export type MeshRecord =
  | { kind: "text"; text: string }
  | { kind: "position"; position: Position | null; time: number }
  | { kind: "nodeinfo"; userId: string; longName: string; shortName: string; hwModel: string; role: string }
  | { kind: "routing"; errorReason: string; trace: RouteTrace | null }
  | { kind: "telemetry"; telemetry: TelemetryReading }
  | { kind: "traceroute"; trace: RouteTrace }
  | { kind: "neighborinfo"; nodeId: number; neighbors: Neighbor[] }
  | {
      kind: "map_report";
      longName: string;
      shortName: string;
      hwModel: string;
      role: string;
      firmware: string;
      position: Position | null;
    }
  | { kind: "unknown"; portnum: number };

export type NodeField =
  | "longName"
  | "shortName"
  | "hwModel"
  | "role"
  | "firmware"
  | "channel"
  | "position"
  | "deviceTelemetry"
  | "environmentTelemetry";

export type NodeFieldValue = {
  longName: string;
  shortName: string;
  hwModel: string;
  role: string;
  firmware: string;
  channel: string;
  position: Position;
  deviceTelemetry: DeviceMetrics;
  environmentTelemetry: EnvironmentMetrics;
};

export type NodeRecord = {
  nodeId: number;
  longName: string | null;
  shortName: string | null;
  hwModel: string | null;
  role: string | null;
  firmware: string | null;
  channel: string | null;
  lastPosition: Position | null;
  deviceTelemetry: DeviceMetrics | null;
  environmentTelemetry: EnvironmentMetrics | null;
  lastSeen: number;
};

export type PacketRecord = {
  packetId: number;
  fromNodeId: number;
  toNodeId: number;
  portnum: number | null;
  kind: MessageKind | "encrypted";
  channel: string;
  payload: Uint8Array | null;
  importTime: number;
};

export type PacketSeenRecord = {
  packetId: number;
  fromNodeId: number;
  gatewayNodeId: string;
  channel: string;
  topic: string;
  rssi: number | null;
  snr: number | null;
  hopLimit: number;
  hopStart: number;
  hopCount: number | null;
  rxTime: number;
  importTime: number;
};

export type TracerouteRecord = {
  packetId: number;
  fromNodeId: number;
  toNodeId: number;
  route: number[];
  routeBack: number[] | null;
  snrTowards: number[];
  snrBack: number[] | null;
  done: boolean;
  gatewayNodeId: string;
  importTime: number;
  updatedAt: number;
};

export type EdgeKind = "trace" | "neighbor";

export type Edge = {
  from: number;
  to: number;
  kind: EdgeKind;
  observedAt: number;
};

export type NormalizedEvent = {
  packetId: number;
  fromNodeId: number;
  fromName: string | null;
  toNodeId: number;
  toName: string | null;
  gatewayNodeId: string;
  gatewayName: string | null;
  channel: string;
  kind: MessageKind | "encrypted";
  record: MeshRecord | null;
  rssi: number | null;
  snr: number | null;
  hopCount: number | null;
  distanceKm: number | null;
  firstSighting: boolean;
  // Trace edges derived from this packet, empty for everything but route discovery.
  edges: Edge[];
  importTime: string;
};

export type TrafficRow = {
  nodeId: number;
  longName: string | null;
  shortName: string | null;
  channel: string | null;
  packetsSent: number;
  timesSeen: number;
};
