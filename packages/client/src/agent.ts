import { pino } from "pino";
import {
  AgentClosedError,
  DuplicateTransactionError,
  TransactionCancelledError,
  TransactionTimeoutError,
} from "./errors.js";
import {
  toHandler,
  type TransactionEvent,
  type TransactionHandler,
  type TransactionHandlerFn,
} from "./events.js";
import type { Logger } from "./logger.js";
import type { StunMessage } from "./message-codec.js";
import type { TransactionId } from "./transaction-id.js";

export interface PendingTransaction {
  id: TransactionId;
  /** Epoch milliseconds. Evicted by the first sweep strictly after this instant. */
  deadline: number;
  handler: TransactionHandler;
}

/** What the client's loops need from a transaction registry. */
export interface TransactionAgent {
  readonly isClosed: boolean;
  register(id: TransactionId, handler: TransactionHandler, deadline: number): void;
  processInbound(message: StunMessage): void;
  sweepExpired(now: number): number;
  cancel(id: TransactionId): boolean;
  close(): void;
}

export type AgentOptions = {
  fallbackHandler?: TransactionHandler | TransactionHandlerFn | null;
  logger?: Logger;
};

/**
 * Registry of in-flight transactions for one connection.
 *
 * Every mutation of the pending map runs to completion before any handler is
 * invoked, so a transaction is delivered exactly once: matched, timed out,
 * cancelled or flushed on close. Handlers are free to call back into the agent.
 */
export class Agent implements TransactionAgent {
  private transactions = new Map<string, PendingTransaction>();
  private fallbackHandler: TransactionHandler | null;
  private closed = false;
  private readonly logger: Logger;

  constructor(options: AgentOptions = {}) {
    this.fallbackHandler = options.fallbackHandler ? toHandler(options.fallbackHandler) : null;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pendingCount(): number {
    return this.transactions.size;
  }

  setFallbackHandler(handler: TransactionHandler | TransactionHandlerFn | null): void {
    this.fallbackHandler = handler ? toHandler(handler) : null;
  }

  register(id: TransactionId, handler: TransactionHandler, deadline: number): void {
    if (this.closed) {
      throw new AgentClosedError();
    }
    if (!Number.isFinite(deadline)) {
      throw new RangeError(`Transaction deadline must be a finite number, got ${deadline}`);
    }
    const key = id.toHex();
    if (this.transactions.has(key)) {
      throw new DuplicateTransactionError(key);
    }
    this.transactions.set(key, { id, deadline, handler });
  }

  processInbound(message: StunMessage): void {
    const key = message.transactionId.toHex();
    const transaction = this.transactions.get(key);
    this.transactions.delete(key);

    const event: TransactionEvent = { type: "message", message };
    if (transaction) {
      this.dispatch(transaction.handler, event, key);
      return;
    }
    if (this.fallbackHandler) {
      this.dispatch(this.fallbackHandler, event, key);
      return;
    }
    this.logger.debug({ transactionId: key }, "stun_unmatched_message_dropped");
  }

  sweepExpired(now: number): number {
    if (this.closed) {
      throw new AgentClosedError();
    }

    const expired: PendingTransaction[] = [];
    for (const [key, transaction] of this.transactions) {
      if (transaction.deadline < now) {
        expired.push(transaction);
        this.transactions.delete(key);
      }
    }

    for (const transaction of expired) {
      const transactionId = transaction.id.toHex();
      this.dispatch(
        transaction.handler,
        {
          type: "error",
          error: new TransactionTimeoutError({ transactionId, deadline: transaction.deadline }),
        },
        transactionId
      );
    }

    if (expired.length > 0) {
      this.logger.debug({ expired: expired.length }, "stun_transactions_expired");
    }
    return expired.length;
  }

  cancel(id: TransactionId): boolean {
    const key = id.toHex();
    const transaction = this.transactions.get(key);
    if (!transaction) {
      return false;
    }
    this.transactions.delete(key);
    this.dispatch(
      transaction.handler,
      { type: "error", error: new TransactionCancelledError(key) },
      key
    );
    return true;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const pending = Array.from(this.transactions.values());
    this.transactions.clear();
    for (const transaction of pending) {
      this.dispatch(
        transaction.handler,
        { type: "error", error: new AgentClosedError() },
        transaction.id.toHex()
      );
    }
  }

  private dispatch(handler: TransactionHandler, event: TransactionEvent, transactionId: string): void {
    try {
      handler.handleEvent(event);
    } catch (error) {
      this.logger.error({ err: error, transactionId, event: event.type }, "stun_handler_failed");
    }
  }
}
