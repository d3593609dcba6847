import { SystemClock, nowMs, type ClockPort } from "../infra/clock.js";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}

interface RetryPolicyDependencies {
  clock?: ClockPort;
  random?: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 16_000,
  jitterRatio: 0.25,
};

const TERMINAL_ERROR_CODES = new Set([
  "card_declined",
  "insufficient_funds",
  "expired_card",
  "incorrect_cvc",
  "fraudulent",
  "blocked_card",
  "do_not_honor",
  "invalid_card",
]);

const RETRYABLE_ERROR_CODES = new Set([
  "processing_error",
  "rate_limit",
  "api_connection_error",
  "timeout",
  "acquirer_error",
  "issuer_unavailable",
  "provider_unavailable",
]);

export function isTerminalError(code: string | null | undefined): boolean {
  return code !== null && code !== undefined && TERMINAL_ERROR_CODES.has(code);
}

export function isRetryableError(code: string | null | undefined): boolean {
  return code !== null && code !== undefined && RETRYABLE_ERROR_CODES.has(code);
}

export class RetryPolicy {
  private readonly options: RetryPolicyOptions;
  private readonly clock: ClockPort;
  private readonly random: () => number;

  constructor(options: Partial<RetryPolicyOptions> = {}, dependencies: RetryPolicyDependencies = {}) {
    this.options = { ...DEFAULT_RETRY_POLICY, ...options };
    this.clock = dependencies.clock ?? new SystemClock();
    this.random = dependencies.random ?? Math.random;
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  shouldRetry(attemptNumber: number, errorCode: string | null | undefined): boolean {
    if (attemptNumber >= this.options.maxAttempts) {
      return false;
    }
    return isRetryableError(errorCode);
  }

  /** Backoff before the next attempt: base * 2^n, capped, then spread by the jitter ratio. */
  delayMs(attemptNumber: number): number {
    const exponent = Math.max(0, attemptNumber);
    const raw = Math.min(this.options.baseDelayMs * 2 ** exponent, this.options.maxDelayMs);
    const jitter = raw * this.options.jitterRatio * (this.random() * 2 - 1);
    return Math.max(0, Math.round(raw + jitter));
  }

  nextRetryTime(attemptNumber: number): string {
    return new Date(nowMs(this.clock) + this.delayMs(attemptNumber)).toISOString();
  }
}
