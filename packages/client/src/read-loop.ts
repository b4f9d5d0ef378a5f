import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type { TransactionAgent } from "./agent.js";
import { ConnectionClosedError, normalizeError } from "./errors.js";
import type { ByteSource } from "./frame-reader.js";
import type { Logger } from "./logger.js";
import { STOPPED, type LoopOutcome } from "./loop-outcome.js";
import type { MessageDecoder, StunMessage } from "./message-codec.js";

export interface ReadLoopOptions {
  source: ByteSource;
  decoder: MessageDecoder;
  agent: Pick<TransactionAgent, "processInbound">;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Decodes messages until shutdown or end of input and hands each one to the agent.
 *
 * The shutdown signal is only consulted before a decode starts; a decode already
 * waiting on the connection ends when the source is closed. Malformed input is
 * dropped, and the loop yields to the event loop before decoding again. A dispatch
 * failure stops the loop for good.
 */
export async function runReadLoop(options: ReadLoopOptions): Promise<LoopOutcome> {
  const { source, decoder, agent, signal, logger } = options;

  while (!signal.aborted) {
    let message: StunMessage;
    try {
      message = await decoder.decode(source);
    } catch (error) {
      if (error instanceof ConnectionClosedError) {
        logger.debug({ reason: error.message }, "stun_read_loop_input_closed");
        return STOPPED;
      }
      const droppedBytes = source.discardBuffered();
      logger.warn({ err: error, droppedBytes }, "stun_decode_failed");
      await yieldToEventLoop();
      continue;
    }

    const trailingBytes = source.finishFrame();
    if (trailingBytes > 0) {
      logger.debug({ trailingBytes }, "stun_frame_trailing_bytes_dropped");
    }

    try {
      agent.processInbound(message);
    } catch (error) {
      const failure = normalizeError(error);
      logger.error(
        { err: failure, transactionId: message.transactionId.toHex() },
        "stun_dispatch_failed"
      );
      return { status: "failed", error: failure };
    }
  }

  return STOPPED;
}
