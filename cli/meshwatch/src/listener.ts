import { EventEmitter } from "node:events";
import { connect } from "mqtt";
import { BoundedQueue } from "./bounded-queue.js";
import { TransportError } from "./errors.js";
import { createLogger } from "./logger.js";
import { ConnectionState, Metrics } from "./metrics.js";
import { RawMessage } from "./schema.js";
import { errorMessage, nowMs } from "./util.js";

const log = createLogger("listener");

export type BrokerHandlers = {
  connect(): void;
  message(topic: string, payload: Uint8Array): void;
  close(): void;
  error(err: Error): void;
};

/** One broker connection attempt. Created connecting; never reconnects on its own. */
export interface BrokerClient {
  subscribe(topics: string[]): Promise<void>;
  end(): Promise<void>;
}

export type BrokerFactory = (handlers: BrokerHandlers) => BrokerClient;

export type BrokerOptions = {
  url: string;
  username?: string;
  password?: string;
  clientId?: string;
};

export function mqttBrokerFactory(options: BrokerOptions): BrokerFactory {
  return (handlers) => {
    const client = connect(options.url, {
      username: options.username,
      password: options.password,
      clientId: options.clientId,
      // The listener owns reconnect and resubscription.
      reconnectPeriod: 0,
      resubscribe: false,
      connectTimeout: 10_000,
    });
    client.on("connect", () => handlers.connect());
    client.on("message", (topic, payload) => handlers.message(topic, payload));
    client.on("close", () => handlers.close());
    client.on("error", (err) => handlers.error(err));
    return {
      subscribe: async (topics) => {
        await client.subscribeAsync(topics);
      },
      end: () => client.endAsync(true),
    };
  };
}

export type ListenerOptions = {
  topics: string[];
  queueCapacity: number;
  reconnectMinMs: number;
  reconnectMaxMs: number;
};

export function backoffDelay(attempt: number, minMs: number, maxMs: number): number {
  return Math.min(maxMs, minMs * 2 ** Math.max(0, attempt - 1));
}

/**
 * Holds one logical subscription to the broker. Messages go straight into a
 * drop-oldest queue so the broker client never waits on decoding; the
 * decode stage reads `messages`.
 */
export class Listener {
  readonly messages: BoundedQueue<RawMessage>;
  private client?: BrokerClient;
  private generation = 0;
  private attempt = 0;
  private current: ConnectionState = "idle";
  private timer?: NodeJS.Timeout;
  private events = new EventEmitter();

  constructor(
    private options: ListenerOptions,
    private factory: BrokerFactory,
    private metrics: Metrics,
  ) {
    this.messages = new BoundedQueue<RawMessage>(options.queueCapacity);
  }

  get state(): ConnectionState {
    return this.current;
  }

  on(event: "state", listener: (state: ConnectionState) => void) {
    this.events.on(event, listener);
    return this;
  }

  off(event: "state", listener: (state: ConnectionState) => void) {
    this.events.off(event, listener);
    return this;
  }

  start() {
    if (this.current !== "idle") return;
    this.open();
  }

  async stop(): Promise<void> {
    if (this.current === "stopped") return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.generation++;
    this.setState("stopped");
    const client = this.client;
    this.client = undefined;
    this.messages.close();
    if (client) await client.end();
  }

  private setState(state: ConnectionState) {
    if (state === this.current) return;
    this.current = state;
    this.metrics.setConnection(state);
    log.info(`broker ${state}`);
    this.events.emit("state", state);
  }

  private open() {
    const generation = ++this.generation;
    this.setState(this.attempt === 0 ? "connecting" : "reconnecting");
    // Events from a superseded client are ignored.
    const live = () => generation === this.generation;
    this.client = this.factory({
      connect: () => {
        if (!live()) return;
        this.attempt = 0;
        this.setState("connected");
        this.subscribeAll(generation);
      },
      message: (topic, payload) => {
        if (!live()) return;
        this.accept(topic, payload);
      },
      close: () => {
        if (!live()) return;
        this.scheduleReconnect(new TransportError("connection closed"));
      },
      error: (err) => {
        if (!live()) return;
        this.scheduleReconnect(new TransportError(errorMessage(err), { cause: err }));
      },
    });
  }

  private subscribeAll(generation: number) {
    const client = this.client;
    if (!client) return;
    client.subscribe(this.options.topics).then(
      () => log.info(`subscribed to ${this.options.topics.join(", ")}`),
      (err: unknown) => {
        if (generation !== this.generation) return;
        this.scheduleReconnect(new TransportError(`subscribe failed: ${errorMessage(err)}`, { cause: err }));
      },
    );
  }

  private accept(topic: string, payload: Uint8Array) {
    this.metrics.inc("raw_in");
    this.metrics.markIngest();
    const dropped = this.messages.offer({ topic, payload, receivedAt: nowMs() });
    if (dropped) this.metrics.inc("raw_dropped");
  }

  private scheduleReconnect(cause: TransportError) {
    if (this.current === "stopped" || this.timer) return;
    this.metrics.recordError(cause.message);
    log.warn(cause.message);
    const stale = this.client;
    this.client = undefined;
    this.generation++;
    if (stale) {
      stale.end().catch((err: unknown) => log.debug(`closing stale client: ${errorMessage(err)}`));
    }
    this.attempt++;
    this.metrics.inc("reconnects");
    this.setState("reconnecting");
    const delay = backoffDelay(this.attempt, this.options.reconnectMinMs, this.options.reconnectMaxMs);
    log.info(`reconnecting in ${delay}ms (attempt ${this.attempt})`);
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.open();
    }, delay);
  }
}
