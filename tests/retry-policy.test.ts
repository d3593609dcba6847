import { describe, expect, it } from "vitest";
import { RetryPolicy, isRetryableError, isTerminalError } from "../src/application/retry-policy.js";
import { MutableClock } from "./harness.js";

describe("Retry policy", () => {
  it("retries transient errors until the attempt budget is spent", () => {
    const policy = new RetryPolicy();

    expect(policy.shouldRetry(4, "timeout")).toBe(true);
    expect(policy.shouldRetry(5, "timeout")).toBe(false);
    expect(policy.shouldRetry(0, "card_declined")).toBe(false);
    expect(policy.shouldRetry(0, "unknown_code")).toBe(false);
    expect(policy.shouldRetry(0, null)).toBe(false);
  });

  it("backs off exponentially up to the cap", () => {
    const policy = new RetryPolicy({}, { random: () => 0.5 });

    expect(policy.delayMs(0)).toBe(1000);
    expect(policy.delayMs(3)).toBe(8000);
    expect(policy.delayMs(5)).toBe(16_000);
    expect(policy.delayMs(-2)).toBe(1000);
  });

  it("spreads delays by the jitter ratio", () => {
    expect(new RetryPolicy({}, { random: () => 0 }).delayMs(0)).toBe(750);
    expect(new RetryPolicy({}, { random: () => 1 }).delayMs(0)).toBe(1250);
  });

  it("schedules the next retry from the clock", () => {
    const policy = new RetryPolicy({}, { clock: new MutableClock(), random: () => 0.5 });

    expect(policy.nextRetryTime(1)).toBe("2026-03-01T10:00:02.000Z");
  });

  it("classifies error codes", () => {
    expect(isTerminalError("fraudulent")).toBe(true);
    expect(isTerminalError("timeout")).toBe(false);
    expect(isRetryableError("issuer_unavailable")).toBe(true);
    expect(isRetryableError("insufficient_funds")).toBe(false);
    expect(isRetryableError(undefined)).toBe(false);
  });
});
