import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import { circuitKeyFor } from "../domain/attempt-key.js";
import type { ConnectionTokenResult, ProviderName, TerminalPairingResult } from "../domain/types.js";
import { fingerprintPayload } from "../infra/fingerprint.js";
import type { ProcessorMetricsRegistry } from "../infra/metrics.js";
import type { CircuitBreakerPort } from "../ports/circuit-breaker.js";
import type {
  PairTerminalInput,
  ProviderCallOptions,
  ProviderClientSet,
} from "../ports/provider-client.js";
import { invokeProvider, settleCircuit, type ProviderCallResult } from "./provider-call.js";

export interface TerminalServiceDependencies {
  clients: ProviderClientSet;
  circuitBreaker: CircuitBreakerPort;
  logger: Logger;
  metrics?: ProcessorMetricsRegistry;
  providerTimeoutMs?: number;
}

function rejected(code: string, message: string): { success: false; transaction_id: null; code: string; message: string } {
  return { success: false, transaction_id: null, code, message };
}

/**
 * Card-present plumbing that belongs to an org rather than a payment attempt.
 * Pairing keys are derived from the request so a repeated pairing is deduplicated;
 * connection tokens are single use and always get a fresh key.
 */
export class TerminalService {
  private readonly logger: Logger;
  private readonly providerTimeoutMs: number;

  constructor(private readonly dependencies: TerminalServiceDependencies) {
    this.logger = dependencies.logger.child({ component: "terminal-service" });
    this.providerTimeoutMs = dependencies.providerTimeoutMs ?? 10_000;
  }

  async pairTerminal(orgId: string, provider: ProviderName, input: PairTerminalInput): Promise<TerminalPairingResult> {
    const idempotencyKey = `idem_${orgId}_pair_${fingerprintPayload({ provider, ...input })}`;
    const call = await this.call(orgId, provider, "pair_terminal", idempotencyKey, (options) =>
      this.dependencies.clients[provider].pairTerminal(input, options),
    );
    if (call === "circuit_open") {
      return { ...rejected("circuit_open", this.circuitMessage(orgId, provider)), reader_id: null, reader_status: null };
    }
    if (!call.ok) {
      return { ...rejected("processing_error", call.errorMessage), reader_id: null, reader_status: null };
    }
    const outcome = call.value;
    if (!outcome.success) {
      return { ...rejected(outcome.errorCode, outcome.errorMessage), reader_id: null, reader_status: null };
    }
    this.logger.info({ orgId, provider, readerId: outcome.reference }, "terminal paired");
    return {
      success: true,
      transaction_id: outcome.reference,
      code: null,
      message: null,
      reader_id: outcome.reference,
      reader_status: outcome.readerStatus,
    };
  }

  async createConnectionToken(
    orgId: string,
    provider: ProviderName,
    locationId?: string,
  ): Promise<ConnectionTokenResult> {
    const idempotencyKey = `idem_${orgId}_connection_token_${randomUUID()}`;
    const call = await this.call(orgId, provider, "connection_token", idempotencyKey, (options) =>
      this.dependencies.clients[provider].createConnectionToken(locationId, options),
    );
    if (call === "circuit_open") {
      return { ...rejected("circuit_open", this.circuitMessage(orgId, provider)), secret: null };
    }
    if (!call.ok) {
      return { ...rejected("processing_error", call.errorMessage), secret: null };
    }
    const outcome = call.value;
    if (!outcome.success) {
      return { ...rejected(outcome.errorCode, outcome.errorMessage), secret: null };
    }
    return { success: true, transaction_id: null, code: null, message: null, secret: outcome.secret };
  }

  private async call<TValue extends { status: string }>(
    orgId: string,
    provider: ProviderName,
    operation: string,
    idempotencyKey: string,
    call: (options: ProviderCallOptions) => Promise<TValue>,
  ): Promise<ProviderCallResult<TValue> | "circuit_open"> {
    const circuitKey = circuitKeyFor(provider, orgId);
    if (await this.dependencies.circuitBreaker.isOpen(circuitKey)) {
      this.dependencies.metrics?.recordCircuitRejection(provider);
      return "circuit_open";
    }

    const result = await invokeProvider(this.providerTimeoutMs, idempotencyKey, call);
    if (!result.ok) {
      this.logger.warn({ orgId, provider, operation, errorCode: result.errorCode }, "provider call failed");
    }
    const outcome = await settleCircuit(this.dependencies.circuitBreaker, circuitKey, result);
    this.dependencies.metrics?.recordProviderCall(provider, operation, outcome);
    return result;
  }

  private circuitMessage(orgId: string, provider: ProviderName): string {
    return `Circuit open for provider '${provider}' in org '${orgId}'.`;
  }
}
