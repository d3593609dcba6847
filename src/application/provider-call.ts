import type { ProviderCallOutcomeLabel } from "../infra/metrics.js";
import type { CircuitBreakerPort } from "../ports/circuit-breaker.js";
import type { ProviderCallOptions } from "../ports/provider-client.js";
import { isRetryableError } from "./retry-policy.js";

export type ProviderCallResult<TValue> =
  | { ok: true; value: TValue }
  | { ok: false; errorCode: "timeout" | "processing_error"; errorMessage: string };

export class ProviderTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Provider call timed out after ${timeoutMs}ms.`);
    this.name = "ProviderTimeoutError";
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * Runs one provider call under a timeout. A client that ignores the signal is
 * still abandoned once it fires; the outcome is then reported as `timeout` and
 * never assumed to have succeeded.
 */
export async function invokeProvider<TValue>(
  timeoutMs: number,
  idempotencyKey: string,
  call: (options: ProviderCallOptions) => Promise<TValue>,
): Promise<ProviderCallResult<TValue>> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new ProviderTimeoutError(timeoutMs)), timeoutMs);

  try {
    const value = await Promise.race([
      call({ idempotencyKey, signal: controller.signal }),
      rejectOnAbort(controller.signal),
    ]);
    return { ok: true, value };
  } catch (error) {
    if (controller.signal.aborted) {
      return { ok: false, errorCode: "timeout", errorMessage: `Provider call timed out after ${timeoutMs}ms.` };
    }
    return {
      ok: false,
      errorCode: "processing_error",
      errorMessage: error instanceof Error ? error.message : "Provider call failed.",
    };
  } finally {
    clearTimeout(timer);
  }
}

// Answered by the client itself; no request went out, so the circuit learns nothing.
const LOCAL_OUTCOME_CODES: ReadonlySet<string> = new Set(["unsupported_operation"]);

/**
 * Feeds one call result into the circuit for `circuitKey` and returns its metric label.
 * Only transient faults count as failures; a request the network rejected still round-tripped.
 */
export async function settleCircuit<TValue extends { status: string }>(
  circuitBreaker: CircuitBreakerPort,
  circuitKey: string,
  result: ProviderCallResult<TValue>,
): Promise<ProviderCallOutcomeLabel> {
  if (!result.ok) {
    await circuitBreaker.recordFailure(circuitKey);
    return result.errorCode === "timeout" ? "timeout" : "error";
  }

  const value = result.value;
  if (value.status === "failed") {
    const errorCode = "errorCode" in value && typeof value.errorCode === "string" ? value.errorCode : null;
    if (errorCode !== null && LOCAL_OUTCOME_CODES.has(errorCode)) {
      return "unsupported";
    }
    if (isRetryableError(errorCode)) {
      await circuitBreaker.recordFailure(circuitKey);
    } else {
      await circuitBreaker.recordSuccess(circuitKey);
    }
    return "failed";
  }

  await circuitBreaker.recordSuccess(circuitKey);
  return value.status === "declined" ? "declined" : "succeeded";
}
