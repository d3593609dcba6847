import type { CircuitBreakerPort, CircuitSnapshot } from "../ports/circuit-breaker.js";
import { SystemClock, nowMs, type ClockPort } from "./clock.js";

export interface CircuitBreakerPolicy {
  failureThreshold: number;
  cooldownSeconds: number;
}

interface InMemoryCircuitBreakerOptions {
  policy?: Partial<CircuitBreakerPolicy>;
  clock?: ClockPort;
}

interface CircuitState {
  readonly consecutiveFailures: number;
  readonly openedUntilMs: number | null;
  readonly lastFailureMs: number | null;
}

const MAX_CAS_ROUNDS = 8;

export const DEFAULT_CIRCUIT_POLICY: CircuitBreakerPolicy = {
  failureThreshold: 3,
  cooldownSeconds: 30,
};

/**
 * Process-wide breaker keyed by `provider:org`. Entries are immutable snapshots
 * replaced through compare-and-set, so concurrent attempts never hold a lock.
 * Once the cool-down lapses the next call is let through; a failure on it reopens
 * the circuit straight away because the failure count is kept until a success.
 */
export class InMemoryCircuitBreaker implements CircuitBreakerPort {
  private readonly circuits = new Map<string, CircuitState>();
  private readonly policy: CircuitBreakerPolicy;
  private readonly clock: ClockPort;

  constructor(options: InMemoryCircuitBreakerOptions = {}) {
    this.policy = { ...DEFAULT_CIRCUIT_POLICY, ...(options.policy ?? {}) };
    this.clock = options.clock ?? new SystemClock();
  }

  isOpen(key: string): boolean {
    const state = this.circuits.get(key);
    if (!state?.openedUntilMs) {
      return false;
    }
    return nowMs(this.clock) < state.openedUntilMs;
  }

  recordSuccess(key: string): void {
    this.update(key, () => undefined);
  }

  recordFailure(key: string): void {
    const now = nowMs(this.clock);
    this.update(key, (current) => {
      const consecutiveFailures = (current?.consecutiveFailures ?? 0) + 1;
      const previousOpenUntil = current?.openedUntilMs ?? null;
      const alreadyOpen = previousOpenUntil !== null && previousOpenUntil > now;
      const openedUntilMs = consecutiveFailures >= this.policy.failureThreshold && !alreadyOpen
        ? now + this.policy.cooldownSeconds * 1000
        : previousOpenUntil;
      return { consecutiveFailures, openedUntilMs, lastFailureMs: now };
    });
  }

  getState(key: string): CircuitSnapshot {
    const state = this.circuits.get(key);
    if (!state) {
      return { state: "closed", failure_count: 0, opened_until: null, last_failure_at: null };
    }
    return {
      state: this.isOpen(key) ? "open" : "closed",
      failure_count: state.consecutiveFailures,
      opened_until: state.openedUntilMs === null ? null : new Date(state.openedUntilMs).toISOString(),
      last_failure_at: state.lastFailureMs === null ? null : new Date(state.lastFailureMs).toISOString(),
    };
  }

  reset(key: string): void {
    this.update(key, () => undefined);
  }

  private update(key: string, next: (current: CircuitState | undefined) => CircuitState | undefined): void {
    // Losing every round only drops a counter update, which the breaker tolerates.
    for (let round = 0; round < MAX_CAS_ROUNDS; round += 1) {
      const current = this.circuits.get(key);
      if (this.compareAndSet(key, current, next(current))) {
        return;
      }
    }
  }

  private compareAndSet(key: string, expected: CircuitState | undefined, replacement: CircuitState | undefined): boolean {
    if (this.circuits.get(key) !== expected) {
      return false;
    }
    if (replacement === undefined) {
      this.circuits.delete(key);
    } else {
      this.circuits.set(key, Object.freeze(replacement));
    }
    return true;
  }
}
