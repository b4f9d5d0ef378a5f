export type StunErrorCode =
  | "AGENT_CLOSED"
  | "TRANSACTION_TIMEOUT"
  | "TRANSACTION_CANCELLED"
  | "DUPLICATE_TRANSACTION"
  | "MESSAGE_DECODE"
  | "CONNECTION_CLOSED"
  | "FATAL_INVARIANT";

export abstract class StunError extends Error {
  abstract readonly code: StunErrorCode;
}

/** The agent no longer accepts registrations or sweeps. Expected once shutdown begins. */
export class AgentClosedError extends StunError {
  readonly code = "AGENT_CLOSED";

  constructor(message = "Agent closed") {
    super(message);
    this.name = "AgentClosedError";
  }
}

export class TransactionTimeoutError extends StunError {
  readonly code = "TRANSACTION_TIMEOUT";
  readonly transactionId: string;
  readonly deadline: number;

  constructor(params: { transactionId: string; deadline: number }) {
    super(`Transaction ${params.transactionId} timed out`);
    this.name = "TransactionTimeoutError";
    this.transactionId = params.transactionId;
    this.deadline = params.deadline;
  }
}

export class TransactionCancelledError extends StunError {
  readonly code = "TRANSACTION_CANCELLED";
  readonly transactionId: string;

  constructor(transactionId: string) {
    super(`Transaction ${transactionId} cancelled`);
    this.name = "TransactionCancelledError";
    this.transactionId = transactionId;
  }
}

export class DuplicateTransactionError extends StunError {
  readonly code = "DUPLICATE_TRANSACTION";
  readonly transactionId: string;

  constructor(transactionId: string) {
    super(`Transaction ${transactionId} is already pending`);
    this.name = "DuplicateTransactionError";
    this.transactionId = transactionId;
  }
}

export class MessageDecodeError extends StunError {
  readonly code = "MESSAGE_DECODE";

  constructor(message: string) {
    super(message);
    this.name = "MessageDecodeError";
  }
}

export class ConnectionClosedError extends StunError {
  readonly code = "CONNECTION_CLOSED";

  constructor(message = "Connection closed") {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

/**
 * The agent's bookkeeping can no longer be trusted. Surfaced by the sweep loop
 * and turned into a process abort by the client.
 */
export class FatalInvariantError extends StunError {
  readonly code = "FATAL_INVARIANT";
  readonly violation: Error;

  constructor(violation: Error) {
    super(`Fatal agent invariant violation: ${violation.message}`, { cause: violation });
    this.name = "FatalInvariantError";
    this.violation = violation;
  }
}

export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
