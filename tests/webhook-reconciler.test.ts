import { describe, expect, it } from "vitest";
import type {
  AdyenPaymentRequest,
  AdyenPaymentResponse,
  AdyenRequestOptions,
  AdyenResponse,
} from "../src/adapters/providers/adyen/adyen-api.js";
import { SandboxAdyenApi } from "../src/adapters/providers/adyen/sandbox-adyen-api.js";
import { signAdyenPayload, signStripePayload } from "../src/adapters/providers/webhook-signatures.js";
import { WebhookReconciler, needsRedelivery, type WebhookItemResult } from "../src/application/webhook-reconciler.js";
import { cardPayment, createHarness, silentLogger, type HarnessOptions } from "./harness.js";

const HMAC_KEY = Buffer.from("test-secret").toString("base64");

/** Lets a test deliver a notification while the payment call is still in flight. */
class EarlyNotifyingAdyenApi extends SandboxAdyenApi {
  onAccepted: ((request: AdyenPaymentRequest, payment: AdyenPaymentResponse) => void) | null = null;

  override async payments(
    request: AdyenPaymentRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenPaymentResponse>> {
    const response = await super.payments(request, options);
    const onAccepted = this.onAccepted;
    this.onAccepted = null;
    if (response.ok && onAccepted) {
      onAccepted(request, response.body);
    }
    return response;
  }
}

function createReconciler(options: HarnessOptions = {}) {
  const harness = createHarness(options);
  const reconciler = new WebhookReconciler({
    directory: harness.directory,
    store: harness.store,
    clients: harness.clients,
    secrets: { stripe: "test-secret", adyen: HMAC_KEY },
    logger: silentLogger(),
    metrics: harness.metrics,
  });
  return { ...harness, reconciler };
}

function stripeEvent(id: string, type: string, paymentIntentId: string): string {
  return JSON.stringify({ id, type, data: { object: { id: paymentIntentId, object: "payment_intent" } } });
}

function stripeSignature(body: string): string {
  return signStripePayload("test-secret", Math.floor(Date.now() / 1000), body);
}

describe("Webhook reconciler", () => {
  it("routes a verified event to the owning attempt", async () => {
    const { reconciler, directory, metrics } = createReconciler();
    await directory.stripe("org_1", "pi_1").authorize(cardPayment("tok_test_3ds", false));
    const body = stripeEvent("evt_1", "payment_intent.succeeded", "pi_sandbox_1");

    const results = await reconciler.reconcile({ provider: "stripe", rawBody: body, signature: stripeSignature(body) });

    expect(results).toEqual([
      {
        event_type: "payment_intent.succeeded",
        provider_reference: "pi_sandbox_1",
        external_event_id: "evt_1",
        outcome: "applied",
        transition: "authorization_completed",
        status: "authorized",
      },
    ]);
    expect(metrics.renderPrometheus()).toContain('ppc_webhooks_total{provider="stripe",outcome="applied"} 1');
  });

  it("treats a redelivered event as a no-op", async () => {
    const { reconciler, directory } = createReconciler();
    await directory.stripe("org_1", "pi_1").authorize(cardPayment("tok_test_3ds", false));
    const body = stripeEvent("evt_1", "payment_intent.succeeded", "pi_sandbox_1");

    await reconciler.reconcile({ provider: "stripe", rawBody: body, signature: stripeSignature(body) });
    const [redelivered] = await reconciler.reconcile({ provider: "stripe", rawBody: body, signature: stripeSignature(body) });

    expect(redelivered?.outcome).toBe("noop");
    expect(redelivered?.status).toBe("authorized");
  });

  it("reports events for unknown references as unmatched", async () => {
    const { reconciler } = createReconciler();
    const body = stripeEvent("evt_2", "payment_intent.succeeded", "pi_unknown");

    const results = await reconciler.reconcile({ provider: "stripe", rawBody: body, signature: stripeSignature(body) });

    expect(results).toEqual([
      {
        event_type: "payment_intent.succeeded",
        provider_reference: "pi_unknown",
        external_event_id: "evt_2",
        outcome: "unmatched",
        transition: null,
        status: null,
      },
    ]);
    expect(needsRedelivery(results)).toBe(true);
  });

  it("rejects unsigned and mis-signed deliveries", async () => {
    const { reconciler, metrics } = createReconciler();
    const body = stripeEvent("evt_3", "payment_intent.succeeded", "pi_sandbox_1");

    await expect(reconciler.reconcile({ provider: "stripe", rawBody: body, signature: undefined })).rejects.toMatchObject({
      statusCode: 401,
      code: "invalid_webhook_signature",
    });
    await expect(
      reconciler.reconcile({ provider: "stripe", rawBody: body, signature: signStripePayload("other-secret", Math.floor(Date.now() / 1000), body) }),
    ).rejects.toMatchObject({ statusCode: 401, code: "invalid_webhook_signature" });
    expect(metrics.renderPrometheus()).toContain('ppc_webhooks_total{provider="stripe",outcome="rejected"} 2');
  });

  it("rejects a signed body it cannot parse", async () => {
    const { reconciler } = createReconciler();
    const body = "not json";

    await expect(reconciler.reconcile({ provider: "stripe", rawBody: body, signature: stripeSignature(body) })).rejects.toMatchObject({
      statusCode: 400,
      code: "invalid_webhook_payload",
      message: "Webhook body is not a card network A event.",
    });
  });

  it("handles every item of a notification batch in order", async () => {
    const { reconciler, directory } = createReconciler();
    await directory.adyen("org_1", "pi_2").authorize(cardPayment("tok_test_pending", false));
    const body = JSON.stringify({
      live: "false",
      notificationItems: [
        { NotificationRequestItem: { eventCode: "AUTHORISATION", success: "true", pspReference: "PSP_SANDBOX_1" } },
        { NotificationRequestItem: { eventCode: "CAPTURE", success: "true", pspReference: "MOD_9", originalReference: "PSP_OTHER" } },
      ],
    });

    const results = await reconciler.reconcile({ provider: "adyen", rawBody: body, signature: signAdyenPayload(HMAC_KEY, body) });

    expect(results.map((result) => [result.outcome, result.status])).toEqual([
      ["applied", "authorized"],
      ["unmatched", null],
    ]);
    expect(results[1]?.external_event_id).toBe("MOD_9:CAPTURE");
  });

  it("resolves a notification that lands before the payment call commits", async () => {
    const adyenApi = new EarlyNotifyingAdyenApi();
    const { reconciler, directory } = createReconciler({ adyenApi });
    const deliveries: Promise<WebhookItemResult[]>[] = [];
    adyenApi.onAccepted = (request, payment) => {
      const body = JSON.stringify({
        live: "false",
        notificationItems: [
          {
            NotificationRequestItem: {
              eventCode: "AUTHORISATION",
              success: "true",
              pspReference: payment.pspReference,
              merchantReference: request.reference,
            },
          },
        ],
      });
      deliveries.push(reconciler.reconcile({ provider: "adyen", rawBody: body, signature: signAdyenPayload(HMAC_KEY, body) }));
    };

    const actor = directory.adyen("org_1", "pi_race");
    const authorized = await actor.authorize(cardPayment("tok_test_pending", false));
    const [results] = await Promise.all(deliveries);
    const state = await actor.getState();

    expect(authorized.status).toBe("pending");
    expect(results).toEqual([
      {
        event_type: "AUTHORISATION",
        provider_reference: "PSP_SANDBOX_1",
        external_event_id: "PSP_SANDBOX_1:AUTHORISATION",
        outcome: "applied",
        transition: "authorization_completed",
        status: "authorized",
      },
    ]);
    expect(state.status).toBe("authorized");
    expect(state.events.map((event) => event.type)).toEqual(["authorization_pending", "AUTHORISATION"]);
  });

  it("defers a completion for an attempt whose call has not settled", async () => {
    const { reconciler, directory } = createReconciler();
    await directory.stripe("org_1", "pi_slow").authorize(cardPayment("tok_test_timeout", false));
    const body = JSON.stringify({
      id: "evt_4",
      type: "payment_intent.succeeded",
      data: {
        object: {
          id: "pi_sandbox_9",
          object: "payment_intent",
          metadata: { payment_intent_id: "pi_slow", org_id: "org_1" },
        },
      },
    });

    const results = await reconciler.reconcile({ provider: "stripe", rawBody: body, signature: stripeSignature(body) });

    expect(results.map((result) => [result.outcome, result.status])).toEqual([["deferred", "initiated"]]);
    expect(needsRedelivery(results)).toBe(true);
  });

  it("ignores unmatched notifications that carry no transition", async () => {
    const { reconciler } = createReconciler();
    const body = JSON.stringify({
      live: "false",
      notificationItems: [{ NotificationRequestItem: { eventCode: "REPORT_AVAILABLE", success: "true", pspReference: "PSP_X" } }],
    });

    const results = await reconciler.reconcile({ provider: "adyen", rawBody: body, signature: signAdyenPayload(HMAC_KEY, body) });

    expect(results.map((result) => result.outcome)).toEqual(["ignored"]);
    expect(needsRedelivery(results)).toBe(false);
  });
});
