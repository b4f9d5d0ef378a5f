import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";
import { AgentClosedError, FatalInvariantError } from "./errors.js";
import { runSweepLoop } from "./sweep-loop.js";

const logger = pino({ level: "silent" });

describe("runSweepLoop", () => {
  it("sweeps with the current time on every tick until shutdown", async () => {
    const controller = new AbortController();
    const sweepExpired = vi.fn((_now: number) => 0);
    const loop = runSweepLoop({
      agent: { sweepExpired },
      interval: 5,
      signal: controller.signal,
      logger,
      now: () => 4242,
    });

    await vi.waitFor(() => expect(sweepExpired.mock.calls.length).toBeGreaterThanOrEqual(3));
    controller.abort();

    await expect(loop).resolves.toEqual({ status: "stopped" });
    expect(sweepExpired).toHaveBeenCalledWith(4242);
  });

  it("treats a closed agent as a normal end", async () => {
    const controller = new AbortController();
    const sweepExpired = vi.fn(() => {
      throw new AgentClosedError();
    });

    const outcome = await runSweepLoop({
      agent: { sweepExpired },
      interval: 5,
      signal: controller.signal,
      logger,
    });

    expect(outcome).toEqual({ status: "stopped" });
    expect(sweepExpired).toHaveBeenCalledTimes(1);
  });

  it("reports any other sweep failure as fatal", async () => {
    const controller = new AbortController();
    const sweepExpired = vi.fn(() => {
      throw new Error("pending map out of sync");
    });

    const outcome = await runSweepLoop({
      agent: { sweepExpired },
      interval: 5,
      signal: controller.signal,
      logger,
    });

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") throw new Error("expected failure");
    expect(outcome.error).toBeInstanceOf(FatalInvariantError);
    expect(outcome.error.message).toBe(
      "Fatal agent invariant violation: pending map out of sync"
    );
    expect(sweepExpired).toHaveBeenCalledTimes(1);
  });

  it("never sweeps when shutdown was already signalled", async () => {
    const controller = new AbortController();
    controller.abort();
    const sweepExpired = vi.fn(() => 0);

    const outcome = await runSweepLoop({
      agent: { sweepExpired },
      interval: 5,
      signal: controller.signal,
      logger,
    });

    expect(outcome).toEqual({ status: "stopped" });
    expect(sweepExpired).not.toHaveBeenCalled();
  });
});
