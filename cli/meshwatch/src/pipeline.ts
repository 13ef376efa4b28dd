import { BoundedQueue } from "./bounded-queue.js";
import { decodeRecord } from "./decoders.js";
import { distanceKm } from "./distance.js";
import { decodeEnvelope, EnvelopeContext } from "./envelope.js";
import { StoreConflictError } from "./errors.js";
import { createLogger } from "./logger.js";
import { LiveHub } from "./live-hub.js";
import { Metrics } from "./metrics.js";
import { NodeMerger, observationTime } from "./node-merger.js";
import { PathAssembler } from "./path-assembler.js";
import { RetryingWriter, RetryPolicy } from "./retry.js";
import {
  DecodedEnvelope,
  Edge,
  MeshRecord,
  NormalizedEvent,
  OpaqueObservation,
  RawMessage,
  RouteTrace,
} from "./schema.js";
import { MeshStore, MeshWriter, RecordOutcome } from "./store.js";
import { errorMessage, isoFromMs, parseNodeRef } from "./util.js";

const log = createLogger("pipeline");

export type DecodedWork =
  | { type: "decoded"; envelope: DecodedEnvelope; record: MeshRecord }
  | { type: "opaque"; observation: OpaqueObservation };

/** Route discovery carried by a traceroute packet or a routing reply. */
function traceOf(record: MeshRecord): RouteTrace | null {
  if (record.kind === "traceroute") return record.trace;
  if (record.kind === "routing") return record.trace;
  return null;
}

export type PipelineOptions = {
  envelope: EnvelopeContext;
  decodeWorkers: number;
  storeWorkers: number;
  decodedQueueCapacity: number;
  retry: RetryPolicy;
};

/**
 * Decode workers read raw broker messages and hand decoded work to store
 * workers through a bounded queue; a full queue makes decode workers wait,
 * and that wait backs up into the listener's drop-oldest queue. Nothing a
 * single message does can end a worker loop.
 */
export class Pipeline {
  readonly decoded: BoundedQueue<DecodedWork>;
  private writer: MeshWriter;
  private merger: NodeMerger;
  private assembler: PathAssembler;
  private decodeTasks: Promise<void>[] = [];
  private storeTasks: Promise<void>[] = [];

  constructor(
    private raw: BoundedQueue<RawMessage>,
    private store: MeshStore,
    private hub: LiveHub,
    private metrics: Metrics,
    private options: PipelineOptions,
  ) {
    this.decoded = new BoundedQueue<DecodedWork>(options.decodedQueueCapacity);
    this.writer = new RetryingWriter(store, options.retry, metrics);
    this.merger = new NodeMerger(this.writer, metrics);
    this.assembler = new PathAssembler(this.writer, metrics);
  }

  start() {
    if (this.decodeTasks.length > 0) return;
    for (let i = 0; i < this.options.decodeWorkers; i += 1) this.decodeTasks.push(this.decodeLoop());
    for (let i = 0; i < this.options.storeWorkers; i += 1) this.storeTasks.push(this.storeLoop());
    log.info(`started ${this.options.decodeWorkers} decode and ${this.options.storeWorkers} store workers`);
  }

  /** Closes the raw queue, lets both stages drain, then resolves. */
  async stop(): Promise<void> {
    this.raw.close();
    await Promise.all(this.decodeTasks);
    this.decoded.close();
    await Promise.all(this.storeTasks);
    this.decodeTasks = [];
    this.storeTasks = [];
  }

  /** Decode stage for one message. Failures are counted here and yield null. */
  decode(message: RawMessage): DecodedWork | null {
    const outcome = decodeEnvelope(message, this.options.envelope);
    switch (outcome.type) {
      case "failed":
        this.metrics.inc(outcome.error.stage === "topic" ? "topic_rejected" : "decode_failures");
        log.debug(`dropped message on ${message.topic}: ${outcome.error.message}`);
        return null;
      case "skipped":
        if (outcome.reason === "ignored_sender") this.metrics.inc("ignored");
        return null;
      case "opaque":
        this.metrics.inc("undecryptable");
        log.debug(outcome.reason.message);
        return { type: "opaque", observation: outcome.observation };
      case "decoded": {
        const { envelope } = outcome;
        const record = decodeRecord(envelope.kind, envelope.portnum, envelope.innerPayload);
        if (!record.ok) {
          this.metrics.inc("decode_failures");
          log.debug(`packet ${envelope.packetId} from ${envelope.fromNodeId}: ${record.error.message}`);
          return null;
        }
        return { type: "decoded", envelope, record: record.value };
      }
    }
  }

  /**
   * Store stage for one unit of work: dedup, node merge, path assembly and
   * the live event. Returns the published event, or null when the message
   * was a repeat from a gateway already on record.
   *
   * The sighting is marked processed only after every downstream write
   * lands, so a redelivery of a message whose first pass failed runs again.
   */
  async process(work: DecodedWork): Promise<NormalizedEvent | null> {
    const header = work.type === "decoded" ? work.envelope : work.observation;
    const observedAt = observationTime(header);
    const outcome = await this.writer.recordPacket(work.type === "decoded" ? work.envelope : work.observation);
    this.countOutcome(outcome);
    const sighting = outcome.seenCreated || outcome.pending;
    if (!sighting && !outcome.enriched) return null;

    await this.merger.touch(header.fromNodeId, header.gatewayNodeId, observedAt);
    let edges: Edge[] = [];
    if (work.type === "decoded") {
      await this.merger.applyRecord(work.envelope, work.record, observedAt);
      const trace = traceOf(work.record);
      if (trace) {
        const assembled = await this.assembler.assemble(work.envelope, trace, observedAt);
        if (assembled) edges = assembled.edges;
      }
    }
    if (!sighting) return null;

    const event = this.buildEvent(work, outcome, observedAt, edges);
    await this.writer.markSeenProcessed(header.packetId, header.fromNodeId, header.gatewayNodeId);
    this.hub.publish(event);
    return event;
  }

  private countOutcome(outcome: RecordOutcome) {
    if (outcome.packetCreated) this.metrics.inc("packets_created");
    if (outcome.seenCreated) this.metrics.inc("observations");
    else if (outcome.pending) this.metrics.inc("sightings_resumed");
    else this.metrics.inc("dedup_noops");
  }

  private buildEvent(work: DecodedWork, outcome: RecordOutcome, observedAt: number, edges: Edge[]): NormalizedEvent {
    const header = work.type === "decoded" ? work.envelope : work.observation;
    const gatewayId = parseNodeRef(header.gatewayNodeId);
    const ids = [header.fromNodeId, header.toNodeId];
    if (gatewayId !== null) ids.push(gatewayId);
    const names = this.store.nodeNames(ids);
    const sender = this.store.getNode(header.fromNodeId);
    const gateway = gatewayId !== null ? this.store.getNode(gatewayId) : null;
    return {
      packetId: header.packetId,
      fromNodeId: header.fromNodeId,
      fromName: names.get(header.fromNodeId) ?? null,
      toNodeId: header.toNodeId,
      toName: names.get(header.toNodeId) ?? null,
      gatewayNodeId: header.gatewayNodeId,
      gatewayName: gatewayId !== null ? names.get(gatewayId) ?? null : null,
      channel: header.channel,
      kind: work.type === "decoded" ? work.envelope.kind : "encrypted",
      record: work.type === "decoded" ? work.record : null,
      rssi: header.rssi ?? null,
      snr: header.snr ?? null,
      hopCount: header.hopCount,
      distanceKm: distanceKm(sender?.lastPosition, gateway?.lastPosition),
      firstSighting: outcome.packetCreated,
      edges,
      importTime: isoFromMs(observedAt),
    };
  }

  private async decodeLoop() {
    for await (const message of this.raw) {
      try {
        const work = this.decode(message);
        if (work) await this.decoded.put(work);
      } catch (err) {
        this.metrics.inc("worker_errors");
        log.error(`decode worker: ${errorMessage(err)}`);
      }
    }
  }

  private async storeLoop() {
    for await (const work of this.decoded) {
      try {
        await this.process(work);
        this.metrics.storeSucceeded();
      } catch (err) {
        const header = work.type === "decoded" ? work.envelope : work.observation;
        if (err instanceof StoreConflictError) {
          this.metrics.inc("dedup_noops");
          log.debug(`packet ${header.packetId} from ${header.fromNodeId}: ${err.message}`);
          continue;
        }
        const msg = `dropped packet ${header.packetId} from ${header.fromNodeId}: ${errorMessage(err)}`;
        this.metrics.storeDropped(msg);
        log.error(msg);
      }
    }
  }
}
