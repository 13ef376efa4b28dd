import { nowMs } from "./util.js";

export type ConnectionState = "idle" | "connecting" | "connected" | "reconnecting" | "stopped";

export type HealthState = "ok" | "degraded";

export type PipelineCounters = {
  raw_in: number;
  raw_dropped: number;
  reconnects: number;
  topic_rejected: number;
  decode_failures: number;
  undecryptable: number;
  ignored: number;
  packets_created: number;
  dedup_noops: number;
  observations: number;
  sightings_resumed: number;
  node_merges: number;
  store_retries: number;
  store_drops: number;
  trace_anomalies: number;
  subscriber_evictions: number;
  events_published: number;
  worker_errors: number;
};

export type HealthSnapshot = {
  status: HealthState;
  connection: ConnectionState;
  connection_since: number;
  last_ingest_ms: number;
  last_error: string | null;
  counters: PipelineCounters;
};

// Consecutive dropped store writes before health reports degraded.
const DEGRADED_AFTER_DROPS = 3;

export class Metrics {
  private counters: PipelineCounters = {
    raw_in: 0,
    raw_dropped: 0,
    reconnects: 0,
    topic_rejected: 0,
    decode_failures: 0,
    undecryptable: 0,
    ignored: 0,
    packets_created: 0,
    dedup_noops: 0,
    observations: 0,
    sightings_resumed: 0,
    node_merges: 0,
    store_retries: 0,
    store_drops: 0,
    trace_anomalies: 0,
    subscriber_evictions: 0,
    events_published: 0,
    worker_errors: 0,
  };
  private connection: ConnectionState = "idle";
  private connectionSince = nowMs();
  private lastIngestAt = 0;
  private lastError: string | null = null;
  private consecutiveDrops = 0;

  inc(name: keyof PipelineCounters, by = 1) {
    this.counters[name] += by;
  }

  get(name: keyof PipelineCounters): number {
    return this.counters[name];
  }

  setConnection(state: ConnectionState) {
    if (state === this.connection) return;
    this.connection = state;
    this.connectionSince = nowMs();
  }

  markIngest() {
    this.lastIngestAt = nowMs();
  }

  recordError(msg: string) {
    this.lastError = msg;
  }

  storeSucceeded() {
    this.consecutiveDrops = 0;
  }

  storeDropped(msg: string) {
    this.counters.store_drops++;
    this.consecutiveDrops++;
    this.lastError = msg;
  }

  health(): HealthState {
    return this.consecutiveDrops >= DEGRADED_AFTER_DROPS ? "degraded" : "ok";
  }

  snapshot(): HealthSnapshot {
    return {
      status: this.health(),
      connection: this.connection,
      connection_since: this.connectionSince,
      last_ingest_ms: this.lastIngestAt,
      last_error: this.lastError,
      counters: { ...this.counters },
    };
  }
}
