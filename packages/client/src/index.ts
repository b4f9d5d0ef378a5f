export { Agent } from "./agent.js";
export type { AgentOptions, PendingTransaction, TransactionAgent } from "./agent.js";
export { StunClient, createClient, dial } from "./client.js";
export type { ClientState, FatalHandler, StartOptions, StunClientOptions } from "./client.js";
export {
  DEFAULT_TIMEOUT_RATE_MS,
  DEFAULT_TRANSACTION_TIMEOUT_MS,
  parseDurationMs,
  resolveClientSettings,
} from "./config.js";
export type { ClientSettings, ClientSettingsInput } from "./config.js";
export {
  dialConnection,
  isStunNetwork,
  parseAddress,
  wrapSocket,
  wrapUdpSocket,
} from "./connection.js";
export type { ParsedAddress, StunConnection, StunNetwork } from "./connection.js";
export {
  AgentClosedError,
  ConnectionClosedError,
  DuplicateTransactionError,
  FatalInvariantError,
  MessageDecodeError,
  StunError,
  TransactionCancelledError,
  TransactionTimeoutError,
  normalizeError,
} from "./errors.js";
export type { StunErrorCode } from "./errors.js";
export { handlerFromFunction, toHandler } from "./events.js";
export type {
  TransactionError,
  TransactionEvent,
  TransactionHandler,
  TransactionHandlerFn,
} from "./events.js";
export { DatagramReader, createConnectionReader } from "./datagram-reader.js";
export { FrameReader } from "./frame-reader.js";
export type { ByteSource, ConnectionReader } from "./frame-reader.js";
export { createChildLogger, createRootLogger, resolveLogConfig } from "./logger.js";
export type { LogFormat, LogLevel, Logger, ResolvedLogConfig } from "./logger.js";
export type { LoopOutcome } from "./loop-outcome.js";
export {
  HEADER_SIZE,
  MAGIC_COOKIE,
  StunMessageType,
  decodeHeader,
  encodeMessage,
  formatMessageType,
  messageClassOf,
  messageMethodOf,
  stunMessageDecoder,
} from "./message-codec.js";
export type {
  MessageDecoder,
  StunHeader,
  StunMessage,
  StunMessageClass,
} from "./message-codec.js";
export { runReadLoop } from "./read-loop.js";
export type { ReadLoopOptions } from "./read-loop.js";
export { runSweepLoop } from "./sweep-loop.js";
export type { SweepLoopOptions } from "./sweep-loop.js";
export { TRANSACTION_ID_SIZE, TransactionId } from "./transaction-id.js";
