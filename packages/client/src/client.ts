import { Agent, type TransactionAgent } from "./agent.js";
import {
  parseDurationMs,
  resolveClientSettings,
  type ClientSettings,
  type ClientSettingsInput,
} from "./config.js";
import { dialConnection, type StunConnection } from "./connection.js";
import { FatalInvariantError, normalizeError } from "./errors.js";
import {
  toHandler,
  type TransactionHandler,
  type TransactionHandlerFn,
} from "./events.js";
import { createConnectionReader } from "./datagram-reader.js";
import type { ConnectionReader } from "./frame-reader.js";
import { createChildLogger, createRootLogger, type Logger } from "./logger.js";
import type { LoopOutcome } from "./loop-outcome.js";
import {
  encodeMessage,
  stunMessageDecoder,
  type MessageDecoder,
  type StunMessage,
} from "./message-codec.js";
import { runReadLoop } from "./read-loop.js";
import { runSweepLoop } from "./sweep-loop.js";
import type { TransactionId } from "./transaction-id.js";

export type ClientState =
  | { status: "open" }
  | { status: "degraded"; reason: string }
  | { status: "closing" }
  | { status: "closed" };

export type FatalHandler = (error: FatalInvariantError) => void;

export type StunClientOptions = ClientSettingsInput & {
  fallbackHandler?: TransactionHandler | TransactionHandlerFn | null;
  logger?: Logger;
  /** Called once the sweep loop reports a broken invariant. Defaults to aborting the process. */
  onFatal?: FatalHandler;
  agent?: TransactionAgent;
  decoder?: MessageDecoder;
  now?: () => number;
};

export type StartOptions = {
  /** Absolute deadline in epoch milliseconds. Takes precedence over `timeoutMs`. */
  deadline?: number;
  timeoutMs?: number;
};

const abortProcess: FatalHandler = () => {
  process.abort();
};

export class StunClient {
  readonly settings: ClientSettings;
  private readonly agent: TransactionAgent;
  private readonly reader: ConnectionReader;
  private readonly shutdown = new AbortController();
  private readonly logger: Logger;
  private readonly onFatal: FatalHandler;
  private readonly now: () => number;
  private readonly loops: Promise<[LoopOutcome, LoopOutcome]>;
  private closePromise: Promise<void> | null = null;
  private state: ClientState = { status: "open" };
  private stateListeners = new Set<(state: ClientState) => void>();

  constructor(
    private readonly connection: StunConnection,
    options: StunClientOptions = {}
  ) {
    this.settings = resolveClientSettings({
      timeoutRate: options.timeoutRate,
      defaultTimeoutMs: options.defaultTimeoutMs,
    });
    this.logger = options.logger ?? createRootLogger();
    this.onFatal = options.onFatal ?? abortProcess;
    this.now = options.now ?? Date.now;
    this.agent =
      options.agent ??
      new Agent({
        fallbackHandler: options.fallbackHandler,
        logger: createChildLogger(this.logger, "agent"),
      });
    this.reader = createConnectionReader(connection);

    const readLoop = runReadLoop({
      source: this.reader,
      decoder: options.decoder ?? stunMessageDecoder,
      agent: this.agent,
      signal: this.shutdown.signal,
      logger: createChildLogger(this.logger, "read-loop"),
    })
      .catch(toFailedOutcome)
      .then((outcome) => {
        this.handleReadOutcome(outcome);
        return outcome;
      });

    const sweepLoop = runSweepLoop({
      agent: this.agent,
      interval: this.settings.timeoutRate,
      signal: this.shutdown.signal,
      logger: createChildLogger(this.logger, "sweep-loop"),
      now: this.now,
    })
      .catch(toFailedOutcome)
      .then((outcome) => {
        this.handleSweepOutcome(outcome);
        return outcome;
      });

    this.loops = Promise.all([readLoop, sweepLoop]);
  }

  getState(): ClientState {
    return this.state;
  }

  subscribeState(listener: (state: ClientState) => void): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Registers a transaction for `message` and writes it to the connection. The
   * handler later receives exactly one event: the response, a timeout, a
   * cancellation, or the agent closing.
   */
  start(
    message: StunMessage,
    handler: TransactionHandler | TransactionHandlerFn,
    options: StartOptions = {}
  ): void {
    const encoded = encodeMessage(message);
    const timeoutMs =
      options.timeoutMs === undefined
        ? this.settings.defaultTimeoutMs
        : parseDurationMs(options.timeoutMs, "timeoutMs");
    const deadline = options.deadline ?? this.now() + timeoutMs;

    this.agent.register(message.transactionId, toHandler(handler), deadline);
    try {
      this.connection.write(encoded);
    } catch (error) {
      this.agent.cancel(message.transactionId);
      throw normalizeError(error);
    }
  }

  cancel(id: TransactionId): boolean {
    return this.agent.cancel(id);
  }

  /** Safe to call repeatedly; every call resolves once the first shutdown completes. */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.shutdownOnce();
    }
    return this.closePromise;
  }

  private async shutdownOnce(): Promise<void> {
    this.setState({ status: "closing" });
    this.shutdown.abort();
    this.agent.close();
    this.reader.end();
    await this.loops;
    this.connection.close();
    this.setState({ status: "closed" });
    this.logger.debug("stun_client_closed");
  }

  private handleReadOutcome(outcome: LoopOutcome): void {
    if (this.closePromise) {
      return;
    }
    if (outcome.status === "failed") {
      this.logger.error({ err: outcome.error }, "stun_read_loop_failed");
      this.setState({ status: "degraded", reason: outcome.error.message });
      return;
    }
    this.logger.info("stun_connection_input_closed");
    this.setState({ status: "degraded", reason: "Connection input closed" });
  }

  private handleSweepOutcome(outcome: LoopOutcome): void {
    if (outcome.status !== "failed") {
      return;
    }
    const fatal =
      outcome.error instanceof FatalInvariantError
        ? outcome.error
        : new FatalInvariantError(outcome.error);
    this.logger.fatal({ err: fatal }, "stun_sweep_invariant_violated");
    this.onFatal(fatal);
  }

  private setState(next: ClientState): void {
    this.state = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn({ err: error }, "stun_state_listener_failed");
      }
    }
  }
}

function toFailedOutcome(error: unknown): LoopOutcome {
  return { status: "failed", error: normalizeError(error) };
}

export function createClient(
  connection: StunConnection,
  options: StunClientOptions = {}
): StunClient {
  return new StunClient(connection, options);
}

export async function dial(
  network: string,
  address: string,
  options: StunClientOptions = {}
): Promise<StunClient> {
  const connection = await dialConnection(network, address);
  try {
    return new StunClient(connection, options);
  } catch (error) {
    connection.close();
    throw error;
  }
}
