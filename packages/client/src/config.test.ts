import { describe, expect, it } from "vitest";
import {
  DEFAULT_TIMEOUT_RATE_MS,
  DEFAULT_TRANSACTION_TIMEOUT_MS,
  parseDurationMs,
  resolveClientSettings,
} from "./config.js";

describe("resolveClientSettings", () => {
  it("defaults to a 100ms sweep interval", () => {
    expect(resolveClientSettings({}, {})).toEqual({
      timeoutRate: DEFAULT_TIMEOUT_RATE_MS,
      defaultTimeoutMs: DEFAULT_TRANSACTION_TIMEOUT_MS,
    });
    expect(DEFAULT_TIMEOUT_RATE_MS).toBe(100);
  });

  it("reads the sweep interval from the environment", () => {
    expect(resolveClientSettings({}, { STUNWIRE_TIMEOUT_RATE_MS: "250" }).timeoutRate).toBe(250);
  });

  it("prefers explicit settings over the environment", () => {
    const settings = resolveClientSettings(
      { timeoutRate: 20, defaultTimeoutMs: 750 },
      { STUNWIRE_TIMEOUT_RATE_MS: "250" }
    );
    expect(settings).toEqual({ timeoutRate: 20, defaultTimeoutMs: 750 });
  });

  it("rejects non-positive durations", () => {
    expect(() => resolveClientSettings({ timeoutRate: 0 }, {})).toThrow(
      /^Invalid client settings: timeoutRate: /
    );
    expect(() => resolveClientSettings({ defaultTimeoutMs: 1.5 }, {})).toThrow(
      /^Invalid client settings: defaultTimeoutMs: /
    );
  });

  it("rejects a malformed environment value", () => {
    expect(() => resolveClientSettings({}, { STUNWIRE_TIMEOUT_RATE_MS: "soon" })).toThrow(
      /^Invalid STUNWIRE_TIMEOUT_RATE_MS="soon": /
    );
  });
});

describe("parseDurationMs", () => {
  it("accepts positive whole milliseconds", () => {
    expect(parseDurationMs(250, "timeoutMs")).toBe(250);
  });

  it("rejects values that are not positive integers", () => {
    expect(() => parseDurationMs(Number.NaN, "timeoutMs")).toThrow(RangeError);
    expect(() => parseDurationMs(Number.POSITIVE_INFINITY, "timeoutMs")).toThrow(
      /^Invalid timeoutMs: /
    );
    expect(() => parseDurationMs(0, "timeoutMs")).toThrow(/^Invalid timeoutMs: /);
    expect(() => parseDurationMs(1.5, "timeoutMs")).toThrow(/^Invalid timeoutMs: /);
  });
});
