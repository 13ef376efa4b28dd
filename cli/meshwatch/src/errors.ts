export type ErrorCode =
  | "transport"
  | "decode"
  | "undecryptable"
  | "store_conflict"
  | "store_timeout"
  | "anomaly";

export class MeshwatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Broker unreachable or connection lost. The listener reconnects. */
export class TransportError extends MeshwatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("transport", message, options);
  }
}

export type DecodeStage = "topic" | "envelope" | "payload";

export class DecodeError extends MeshwatchError {
  readonly stage: DecodeStage;

  constructor(stage: DecodeStage, message: string, options?: { cause?: unknown }) {
    super("decode", message, options);
    this.stage = stage;
  }
}

export class UndecryptableError extends MeshwatchError {
  constructor(readonly packetId: number, readonly fromNodeId: number) {
    super("undecryptable", `no channel key opens packet ${packetId} from ${fromNodeId}`);
  }
}

export class StoreConflictError extends MeshwatchError {
  constructor(readonly key: string) {
    super("store_conflict", `duplicate key ${key}`);
  }
}

export class StoreTimeoutError extends MeshwatchError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super("store_timeout", `${operation} did not complete within ${timeoutMs}ms`);
  }
}

export class AnomalyWarning extends MeshwatchError {
  constructor(message: string) {
    super("anomaly", message);
  }
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };
