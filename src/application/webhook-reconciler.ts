import type { Logger } from "pino";
import { formatAttemptKey } from "../domain/attempt-key.js";
import type { AttemptStatus, ProviderName } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ProcessorMetricsRegistry } from "../infra/metrics.js";
import type { AttemptStorePort } from "../ports/attempt-store.js";
import type { InboundWebhookEvent, ProviderClientSet } from "../ports/provider-client.js";
import type { ProcessorActorDirectory } from "./processor-actor-directory.js";

export interface WebhookDelivery {
  provider: ProviderName;
  rawBody: string;
  signature: string | undefined;
}

/**
 * `unmatched` and `deferred` items are not settled yet: the network is asked to
 * redeliver them. `ignored` items carry nothing an attempt acts on.
 */
export type WebhookItemOutcome = "applied" | "noop" | "deferred" | "unmatched" | "ignored";

export interface WebhookItemResult {
  event_type: string;
  provider_reference: string;
  external_event_id: string | null;
  outcome: WebhookItemOutcome;
  transition: string | null;
  status: AttemptStatus | null;
}

export interface WebhookReconcilerDependencies {
  directory: ProcessorActorDirectory;
  store: AttemptStorePort;
  clients: ProviderClientSet;
  secrets: Record<ProviderName, string>;
  logger: Logger;
  metrics?: ProcessorMetricsRegistry;
}

export function needsRedelivery(results: readonly WebhookItemResult[]): boolean {
  return results.some((result) => result.outcome === "unmatched" || result.outcome === "deferred");
}

/**
 * Asynchronous entry point for provider notifications. Nothing reaches an actor
 * before the signature checks out; items of a batch are handled in order.
 */
export class WebhookReconciler {
  private readonly logger: Logger;

  constructor(private readonly dependencies: WebhookReconcilerDependencies) {
    this.logger = dependencies.logger.child({ component: "webhook-reconciler" });
  }

  async reconcile(delivery: WebhookDelivery): Promise<WebhookItemResult[]> {
    const { provider, rawBody, signature } = delivery;
    const client = this.dependencies.clients[provider];
    const secret = this.dependencies.secrets[provider];

    if (!secret || !signature || !client.verifyWebhookSignature(rawBody, signature, secret)) {
      this.dependencies.metrics?.recordWebhook(provider, "rejected");
      this.logger.warn({ provider, signaturePresent: Boolean(signature) }, "webhook signature rejected");
      throw new AppError(401, "invalid_webhook_signature", "Webhook signature could not be verified.");
    }

    let events: InboundWebhookEvent[];
    try {
      events = client.parseWebhook(rawBody);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Webhook body could not be parsed.";
      throw new AppError(400, "invalid_webhook_payload", message);
    }

    const results: WebhookItemResult[] = [];
    for (const event of events) {
      const result = await this.reconcileEvent(provider, event);
      this.dependencies.metrics?.recordWebhook(provider, result.outcome);
      results.push(result);
    }
    return results;
  }

  private async reconcileEvent(provider: ProviderName, event: InboundWebhookEvent): Promise<WebhookItemResult> {
    const base = {
      event_type: event.eventType,
      provider_reference: event.providerReference,
      external_event_id: event.externalEventId,
    };

    const key = await this.resolveAttemptKey(provider, event);
    if (!key) {
      const actionable = this.dependencies.clients[provider].translateWebhookEvent(event.eventType, event.rawPayload) !== null;
      this.logger.info({ provider, ...base, actionable }, "webhook matched no payment attempt");
      return { ...base, outcome: actionable ? "unmatched" : "ignored", transition: null, status: null };
    }

    const handled = await this.dependencies.directory
      .resolveKey(key)
      .handleWebhook(event.eventType, event.rawPayload, event.externalEventId);
    return {
      ...base,
      outcome: this.outcomeOf(handled.applied, handled.transition, handled.status),
      transition: handled.transition,
      status: handled.status,
    };
  }

  // The network reference is only stored once the synchronous call commits; until then the hint names the attempt.
  private async resolveAttemptKey(provider: ProviderName, event: InboundWebhookEvent): Promise<string | null> {
    const { store } = this.dependencies;
    const byReference = await store.findKeyByProviderReference(provider, event.providerReference);
    if (byReference || !event.attemptHint) {
      return byReference;
    }

    const { orgId, paymentIntentId } = event.attemptHint;
    if (orgId) {
      const key = formatAttemptKey({ orgId, provider, paymentIntentId });
      return (await store.get(key)) ? key : null;
    }
    const candidates = await store.findKeysByPaymentIntent(provider, paymentIntentId);
    return candidates.length === 1 ? (candidates[0] ?? null) : null;
  }

  private outcomeOf(applied: boolean, transition: string | null, status: AttemptStatus): WebhookItemOutcome {
    if (applied) {
      return "applied";
    }
    // The synchronous call has not settled on another instance yet; a redelivery will find it settled.
    return transition !== null && status === "initiated" ? "deferred" : "noop";
  }
}
