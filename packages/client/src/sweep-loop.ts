import { setInterval as every } from "node:timers/promises";
import type { TransactionAgent } from "./agent.js";
import { AgentClosedError, FatalInvariantError, normalizeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { STOPPED, isAbortError, type LoopOutcome } from "./loop-outcome.js";

export interface SweepLoopOptions {
  agent: Pick<TransactionAgent, "sweepExpired">;
  /** Milliseconds between sweeps. */
  interval: number;
  signal: AbortSignal;
  logger: Logger;
  now?: () => number;
}

/**
 * Evicts expired transactions on every tick until shutdown. A closed agent ends
 * the loop quietly; any other sweep failure comes back as a fatal outcome.
 */
export async function runSweepLoop(options: SweepLoopOptions): Promise<LoopOutcome> {
  const { agent, interval, signal, logger } = options;
  const now = options.now ?? Date.now;

  try {
    for await (const _tick of every(interval, undefined, { signal })) {
      if (signal.aborted) {
        break;
      }
      try {
        agent.sweepExpired(now());
      } catch (error) {
        if (error instanceof AgentClosedError) {
          logger.debug("stun_sweep_loop_agent_closed");
          return STOPPED;
        }
        return { status: "failed", error: new FatalInvariantError(normalizeError(error)) };
      }
    }
  } catch (error) {
    if (!isAbortError(error)) {
      return { status: "failed", error: new FatalInvariantError(normalizeError(error)) };
    }
  }

  return STOPPED;
}
