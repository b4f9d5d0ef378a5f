import type {
  AgentClosedError,
  TransactionCancelledError,
  TransactionTimeoutError,
} from "./errors.js";
import type { StunMessage } from "./message-codec.js";

export type TransactionError =
  | TransactionTimeoutError
  | TransactionCancelledError
  | AgentClosedError;

/** Outcome of a transaction, handed to its handler once and then dropped. */
export type TransactionEvent =
  | { type: "message"; message: StunMessage }
  | { type: "error"; error: TransactionError };

export interface TransactionHandler {
  handleEvent(event: TransactionEvent): void;
}

export type TransactionHandlerFn = (event: TransactionEvent) => void;

export function handlerFromFunction(fn: TransactionHandlerFn): TransactionHandler {
  return { handleEvent: fn };
}

export function toHandler(handler: TransactionHandler | TransactionHandlerFn): TransactionHandler {
  return typeof handler === "function" ? handlerFromFunction(handler) : handler;
}
