import { StoreConflictError, StoreTimeoutError } from "./errors.js";
import { Metrics } from "./metrics.js";
import { NodeObservation, MeshWriter, RecordOutcome, TracerouteMutation } from "./store.js";
import { DecodedEnvelope, OpaqueObservation, TracerouteRecord } from "./schema.js";
import { createLogger } from "./logger.js";
import { errorMessage, sleep } from "./util.js";

const log = createLogger("store");

export type RetryPolicy = {
  timeoutMs: number;
  attempts: number;
  backoffMs: number;
};

export function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StoreTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Runs a store operation under a per-attempt timeout, retrying with
 * doubling backoff. The last error is rethrown once attempts run out.
 * A key conflict is final: another writer already holds the row.
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (attempt: number, err: unknown) => void,
): Promise<T> {
  let lastErr: unknown;
  for (let attempt = 1; attempt <= policy.attempts; attempt += 1) {
    try {
      return await withTimeout(fn(), policy.timeoutMs, operation);
    } catch (err) {
      lastErr = err;
      if (err instanceof StoreConflictError || attempt === policy.attempts) break;
      onRetry?.(attempt, err);
      await sleep(policy.backoffMs * 2 ** (attempt - 1));
    }
  }
  throw lastErr;
}

/** MeshWriter decorator applying the retry policy and counting retries. */
export class RetryingWriter implements MeshWriter {
  constructor(
    private inner: MeshWriter,
    private policy: RetryPolicy,
    private metrics: Metrics,
  ) {}

  private run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(operation, fn, this.policy, (attempt, err) => {
      this.metrics.inc("store_retries");
      log.warn(`${operation} attempt ${attempt} failed: ${errorMessage(err)}`);
    });
  }

  recordPacket(input: DecodedEnvelope | OpaqueObservation): Promise<RecordOutcome> {
    return this.run("recordPacket", () => this.inner.recordPacket(input));
  }

  markSeenProcessed(packetId: number, fromNodeId: number, gatewayNodeId: string): Promise<void> {
    return this.run("markSeenProcessed", () => this.inner.markSeenProcessed(packetId, fromNodeId, gatewayNodeId));
  }

  mergeNodeField(nodeId: number, observation: NodeObservation, observedAt: number): Promise<boolean> {
    return this.run("mergeNodeField", () => this.inner.mergeNodeField(nodeId, observation, observedAt));
  }

  touchNode(nodeId: number, seenAt: number): Promise<void> {
    return this.run("touchNode", () => this.inner.touchNode(nodeId, seenAt));
  }

  updateTraceroute(packetId: number, fromNodeId: number, mutate: TracerouteMutation): Promise<TracerouteRecord | null> {
    return this.run("updateTraceroute", () => this.inner.updateTraceroute(packetId, fromNodeId, mutate));
  }
}
