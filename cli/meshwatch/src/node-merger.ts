import { Metrics } from "./metrics.js";
import { DecodedEnvelope, MeshRecord } from "./schema.js";
import { MeshWriter, NodeObservation } from "./store.js";
import { parseNodeRef } from "./util.js";

/**
 * Field-level last-write-wins merge of node observations. Each field keeps
 * its own update time and only moves forward; the store applies the
 * compare-and-set per node row, so merges for different nodes never wait on
 * each other and any arrival order converges to the newest value.
 */
export class NodeMerger {
  constructor(
    private store: MeshWriter,
    private metrics: Metrics,
  ) {}

  async mergeObservation(nodeId: number, observation: NodeObservation, observedAt: number): Promise<boolean> {
    const applied = await this.store.mergeNodeField(nodeId, observation, observedAt);
    if (applied) this.metrics.inc("node_merges");
    return applied;
  }

  /** Observations a decoded record carries about its sender. */
  observationsFor(envelope: DecodedEnvelope, record: MeshRecord): NodeObservation[] {
    const out: NodeObservation[] = [{ field: "channel", value: envelope.channel }];
    const identity = (longName: string, shortName: string, hwModel: string, role: string) => {
      if (longName) out.push({ field: "longName", value: longName });
      if (shortName) out.push({ field: "shortName", value: shortName });
      if (hwModel) out.push({ field: "hwModel", value: hwModel });
      if (role) out.push({ field: "role", value: role });
    };
    switch (record.kind) {
      case "nodeinfo":
        identity(record.longName, record.shortName, record.hwModel, record.role);
        break;
      case "position":
        if (record.position) out.push({ field: "position", value: record.position });
        break;
      case "telemetry":
        // Device and environment readings arrive in separate packets; each keeps its own clock.
        if (record.telemetry.device) out.push({ field: "deviceTelemetry", value: record.telemetry.device });
        if (record.telemetry.environment) {
          out.push({ field: "environmentTelemetry", value: record.telemetry.environment });
        }
        break;
      case "map_report":
        identity(record.longName, record.shortName, record.hwModel, record.role);
        if (record.firmware) out.push({ field: "firmware", value: record.firmware });
        if (record.position) out.push({ field: "position", value: record.position });
        break;
      case "text":
      case "routing":
      case "traceroute":
      case "neighborinfo":
      case "unknown":
        break;
    }
    return out;
  }

  async applyRecord(envelope: DecodedEnvelope, record: MeshRecord, observedAt: number): Promise<number> {
    let applied = 0;
    for (const observation of this.observationsFor(envelope, record)) {
      if (await this.mergeObservation(envelope.fromNodeId, observation, observedAt)) applied++;
    }
    return applied;
  }

  /** Advances lastSeen for the sender and, when its id parses, the reporting gateway. */
  async touch(fromNodeId: number, gatewayNodeId: string, seenAt: number): Promise<void> {
    await this.store.touchNode(fromNodeId, seenAt);
    const gateway = parseNodeRef(gatewayNodeId);
    if (gateway !== null && gateway !== fromNodeId) await this.store.touchNode(gateway, seenAt);
  }
}

/** Mesh-side receive time when the gateway stamped one, else local receipt. */
export function observationTime(header: { rxTime: number; receivedAt: number }): number {
  return header.rxTime > 0 ? header.rxTime * 1000 : header.receivedAt;
}
