import { describe, expect, it } from "vitest";
import { InMemoryAttemptStore } from "../src/adapters/inmemory/attempt-store.js";
import type {
  StripePaymentIntent,
  StripePaymentIntentCreateParams,
  StripeRequestOptions,
  StripeResponse,
} from "../src/adapters/providers/stripe/stripe-api.js";
import { SandboxStripeApi } from "../src/adapters/providers/stripe/sandbox-stripe-api.js";
import { RetryPolicy } from "../src/application/retry-policy.js";
import type { PaymentAttemptRecord } from "../src/domain/types.js";
import { AttemptVersionConflictError } from "../src/infra/app-error.js";
import { cardPayment, createHarness } from "./harness.js";

class IssuerUnavailableOnceStripeApi extends SandboxStripeApi {
  private declined = false;

  override async createPaymentIntent(
    params: StripePaymentIntentCreateParams,
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>> {
    if (!this.declined) {
      this.declined = true;
      return {
        ok: false,
        status: 402,
        error: { type: "card_error", code: "card_declined", decline_code: "issuer_not_available", message: "Issuer unavailable." },
      };
    }
    return super.createPaymentIntent(params, options);
  }
}

class InterleavingAttemptStore extends InMemoryAttemptStore {
  beforeNextSave: (() => Promise<void>) | null = null;

  override async save(record: PaymentAttemptRecord, expectedVersion: number): Promise<void> {
    const hook = this.beforeNextSave;
    this.beforeNextSave = null;
    if (hook) {
      await hook();
    }
    return super.save(record, expectedVersion);
  }
}

class ContendedAttemptStore extends InMemoryAttemptStore {
  contended = false;

  override async save(record: PaymentAttemptRecord, expectedVersion: number): Promise<void> {
    if (this.contended) {
      throw new AttemptVersionConflictError(record.key, expectedVersion);
    }
    return super.save(record, expectedVersion);
  }
}

describe("Processor actor", () => {
  it("authorizes and captures in one step when auto capture is on", async () => {
    const { directory, notifier, store } = createHarness();
    const actor = directory.stripe("org_a", "pi_a");

    const result = await actor.authorize(cardPayment("tok_test_visa", true));

    expect(result.success).toBe(true);
    expect(result.status).toBe("captured");
    expect(result.transaction_id).toBe("pi_sandbox_1");
    expect(result.network_transaction_id).toBe("ch_sandbox_1");
    expect(result.authorization_code).toMatch(/^\d{6}$/);

    const state = await actor.getState();
    expect(state.captured_amount).toBe(1000);
    expect(state.authorized_amount).toBe(1000);
    expect(state.amount_refundable).toBe(1000);
    expect(state.version).toBe(2);
    expect(state.events.map((event) => event.type)).toEqual(["authorization_captured"]);
    expect(notifier.authorizations).toHaveLength(1);
    expect(notifier.captures).toEqual([
      { orgId: "org_a", paymentIntentId: "pi_a", providerReference: "pi_sandbox_1", capturedAmount: 1000 },
    ]);
    expect(await store.findKeyByProviderReference("stripe", "pi_sandbox_1")).toBe("org_a:stripe:pi_a");
  });

  it("captures a manual authorization once", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_b", "pi_b");

    const authorized = await actor.authorize(cardPayment("tok_test_visa", false));
    expect(authorized.status).toBe("authorized");

    const captured = await actor.capture("pi_sandbox_1");
    expect(captured).toEqual({
      success: true,
      transaction_id: "pi_sandbox_1",
      code: null,
      message: null,
      status: "captured",
      capture_id: "pi_sandbox_1",
      captured_amount: 1000,
    });

    const again = await actor.capture("pi_sandbox_1");
    expect(again.success).toBe(false);
    expect(again.code).toBe("invalid_state");
    expect(again.message).toBe("Cannot capture a payment in status 'captured'.");
    expect(again.status).toBe("captured");
  });

  it("refuses further refunds once the captured amount is refunded", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_c", "pi_c");
    await actor.authorize(cardPayment("tok_test_visa", true));

    const refunded = await actor.refund("pi_sandbox_1", 1000);
    expect(refunded.success).toBe(true);
    expect(refunded.status).toBe("refunded");
    expect(refunded.refund_id).toBe("re_sandbox_2");
    expect(refunded.refunded_amount).toBe(1000);

    const extra = await actor.refund("pi_sandbox_1", 1);
    expect(extra.code).toBe("invalid_state");
    expect(extra.message).toBe("Cannot refund a payment in status 'refunded'.");
  });

  it("does not void a captured payment", async () => {
    const { directory, stripeApi } = createHarness();
    const actor = directory.stripe("org_d", "pi_d");
    await actor.authorize(cardPayment("tok_test_visa", true));

    const voided = await actor.void("pi_sandbox_1");

    expect(voided.success).toBe(false);
    expect(voided.code).toBe("invalid_state");
    expect(voided.message).toBe("Cannot void a payment in status 'captured'.");
    expect(voided.status).toBe("captured");
    expect(stripeApi.calls.map((call) => call.method)).toEqual(["createPaymentIntent"]);
  });

  it("opens the circuit after three timeouts and rejects the next intent without a network call", async () => {
    const { directory, stripeApi, metrics } = createHarness();

    for (const paymentIntentId of ["pi_e1", "pi_e2", "pi_e3"]) {
      const result = await directory.stripe("org_e", paymentIntentId).authorize(cardPayment("tok_test_timeout", true));
      expect(result.code).toBe("processing_error");
      expect(result.message).toBe("Provider call timed out after 50ms.");
      expect(result.status).toBe("initiated");
    }

    const rejected = await directory.stripe("org_e", "pi_e4").authorize(cardPayment("tok_test_visa", true));

    expect(rejected.success).toBe(false);
    expect(rejected.code).toBe("circuit_open");
    expect(rejected.message).toBe("Circuit open for provider 'stripe' in org 'org_e'.");
    expect(rejected.status).toBe("initiated");
    expect(stripeApi.calls).toHaveLength(3);
    expect(metrics.renderPrometheus()).toContain('ppc_circuit_rejections_total{provider="stripe"} 1');
  });

  it("keeps the circuit of another org closed", async () => {
    const { directory } = createHarness();
    for (const paymentIntentId of ["pi_x1", "pi_x2", "pi_x3"]) {
      await directory.stripe("org_noisy", paymentIntentId).authorize(cardPayment("tok_test_timeout", true));
    }

    const result = await directory.stripe("org_quiet", "pi_y").authorize(cardPayment("tok_test_visa", true));

    expect(result.status).toBe("captured");
  });

  it("schedules a retry after a timeout and reuses the idempotency key", async () => {
    const { directory, stripeApi } = createHarness();
    const actor = directory.stripe("org_t", "pi_t");

    await actor.authorize(cardPayment("tok_test_timeout", false));
    const state = await actor.getState();
    expect(state.retry_count).toBe(1);
    expect(state.next_retry_at).toBe("2026-03-01T10:00:02.000Z");
    expect(state.last_error_code).toBe("processing_error");

    await actor.authorize(cardPayment("tok_test_timeout", false));
    const keys = stripeApi.calls.map((call) => call.idempotencyKey);
    expect(keys).toEqual(["idem_pi_t_authorize_key1", "idem_pi_t_authorize_key1"]);
  });

  it("recovers a lost response through the provider's deduplication", async () => {
    const { directory, stripeApi } = createHarness();
    const actor = directory.stripe("org_l", "pi_l");

    const first = await actor.authorize(cardPayment("tok_test_lost_response", false));
    expect(first.code).toBe("processing_error");
    expect(first.message).toBe("socket hang up");
    expect(first.status).toBe("initiated");

    const second = await actor.authorize(cardPayment("tok_test_lost_response", false));
    expect(second.success).toBe(true);
    expect(second.status).toBe("authorized");
    expect(second.transaction_id).toBe("pi_sandbox_1");
    expect(stripeApi.paymentIntentCount).toBe(1);
    expect(new Set(stripeApi.calls.map((call) => call.idempotencyKey)).size).toBe(1);
  });

  it("mints a fresh key for the next generation after a retryable decline", async () => {
    const stripeApi = new IssuerUnavailableOnceStripeApi();
    const { directory, store } = createHarness({ stripeApi });
    const actor = directory.stripe("org_r", "pi_r");

    const declined = await actor.authorize(cardPayment("tok_test_visa", false));
    expect(declined.code).toBe("issuer_unavailable");
    expect(declined.status).toBe("initiated");
    expect((await actor.getState()).next_retry_at).toBe("2026-03-01T10:00:01.000Z");

    const retried = await actor.authorize(cardPayment("tok_test_visa", false));
    expect(retried.status).toBe("authorized");

    const record = await store.get("org_r:stripe:pi_r");
    expect(record?.retry_generation).toBe(1);
    expect(record?.idempotency_keys).toEqual({
      authorize_0: "idem_pi_r_authorize_key1",
      authorize_1: "idem_pi_r_authorize_key2",
    });
  });

  it("fails the attempt on a hard decline", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_h", "pi_h");

    const result = await actor.authorize(cardPayment("tok_test_decline", false));

    expect(result.success).toBe(false);
    expect(result.code).toBe("card_declined");
    expect(result.message).toBe("Your card was declined.");
    expect(result.status).toBe("failed");
    expect((await actor.getState()).retry_count).toBe(0);
  });

  it("fails the attempt once transient retries are exhausted", async () => {
    const { directory } = createHarness({ retryPolicy: new RetryPolicy({ maxAttempts: 1 }) });
    const actor = directory.stripe("org_u", "pi_u");

    const result = await actor.authorize(cardPayment("tok_test_unavailable", false));

    expect(result.code).toBe("processing_error");
    expect(result.status).toBe("failed");
    const state = await actor.getState();
    expect(state.retry_count).toBe(1);
    expect(state.next_retry_at).toBeNull();
  });

  it("rejects a non-positive amount before touching the network", async () => {
    const { directory, stripeApi, store } = createHarness();

    const result = await directory.stripe("org_v", "pi_v").authorize(cardPayment("tok_test_visa", true, 0));

    expect(result.code).toBe("invalid_amount");
    expect(result.status).toBe("initiated");
    expect(stripeApi.calls).toHaveLength(0);
    expect(store.size).toBe(0);
  });

  it("refuses a second authorization", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_w", "pi_w");
    await actor.authorize(cardPayment("tok_test_visa", true));

    const again = await actor.authorize(cardPayment("tok_test_visa", true));

    expect(again.code).toBe("invalid_state");
    expect(again.message).toBe("Cannot authorize a payment in status 'captured'.");
  });

  it("validates the transaction and amount of a capture", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_k", "pi_k");
    await actor.authorize(cardPayment("tok_test_visa", false));

    const foreign = await actor.capture("pi_other");
    expect(foreign.code).toBe("invalid_transaction");
    expect(foreign.message).toBe("Transaction 'pi_other' does not belong to this payment.");

    const tooLarge = await actor.capture("pi_sandbox_1", 1500);
    expect(tooLarge.code).toBe("amount_too_large");
    expect(tooLarge.message).toBe("Amount 1500 exceeds the authorized amount 1000.");

    const partial = await actor.capture("pi_sandbox_1", 600);
    expect(partial.status).toBe("captured");
    expect(partial.captured_amount).toBe(600);
  });

  it("keys partial refunds of the same amount apart", async () => {
    const { directory, stripeApi } = createHarness();
    const actor = directory.stripe("org_p", "pi_p");
    await actor.authorize(cardPayment("tok_test_visa", true));

    const first = await actor.refund("pi_sandbox_1", 400, "requested_by_customer");
    const second = await actor.refund("pi_sandbox_1", 400);
    expect(first.status).toBe("captured");
    expect(second.refunded_amount).toBe(800);

    const tooLarge = await actor.refund("pi_sandbox_1", 300);
    expect(tooLarge.code).toBe("amount_too_large");
    expect(tooLarge.message).toBe("Amount 300 exceeds the refundable amount 200.");

    const last = await actor.refund("pi_sandbox_1", 200);
    expect(last.status).toBe("refunded");
    expect(last.refunded_amount).toBe(1000);

    const refundKeys = stripeApi.calls.filter((call) => call.method === "createRefund").map((call) => call.idempotencyKey);
    expect(refundKeys).toEqual(["idem_pi_p_refund_400_0_key2", "idem_pi_p_refund_400_1_key3", "idem_pi_p_refund_200_2_key4"]);
  });

  it("voids an authorization", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_n", "pi_n");
    await actor.authorize(cardPayment("tok_test_visa", false));

    const voided = await actor.void("pi_sandbox_1", "requested_by_customer");
    expect(voided.success).toBe(true);
    expect(voided.status).toBe("voided");
    expect(voided.void_id).toBe("pi_sandbox_1");
    expect((await actor.getState()).authorized_amount).toBe(0);

    const again = await actor.void("pi_sandbox_1");
    expect(again.message).toBe("Cannot void a payment in status 'voided'.");
  });

  it("reports an unknown attempt as not found", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_z", "pi_missing");

    await expect(actor.getState()).rejects.toMatchObject({ statusCode: 404, code: "attempt_not_found" });
    await expect(actor.capture("pi_sandbox_1")).rejects.toMatchObject({ statusCode: 404, code: "attempt_not_found" });
  });

  it("completes a challenged authorization from a webhook exactly once", async () => {
    const { directory, notifier } = createHarness();
    const actor = directory.stripe("org_s", "pi_s");

    const challenged = await actor.authorize(cardPayment("tok_test_3ds", false));
    expect(challenged.success).toBe(false);
    expect(challenged.code).toBe("requires_action");
    expect(challenged.status).toBe("requires_action");
    expect(challenged.next_action).toEqual({
      type: "redirect_to_url",
      redirect_url: "https://sandbox.invalid/3ds/pi_sandbox_1",
      data: {},
    });

    const applied = await actor.handleWebhook("payment_intent.succeeded", "{}", "evt_1");
    expect(applied).toEqual({ applied: true, transition: "authorization_completed", status: "authorized", version: 3 });

    const duplicate = await actor.handleWebhook("payment_intent.succeeded", "{}", "evt_1");
    expect(duplicate).toEqual({ applied: false, transition: "authorization_completed", status: "authorized", version: 4 });

    const state = await actor.getState();
    expect(state.authorized_amount).toBe(1000);
    expect(state.next_action).toBeNull();
    expect(state.events.map((event) => event.type)).toEqual([
      "authorization_requires_action",
      "payment_intent.succeeded",
      "payment_intent.succeeded",
    ]);
    expect(notifier.authorizations).toHaveLength(1);
  });

  it("records unknown webhook events without a transition", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_q", "pi_q");
    await actor.authorize(cardPayment("tok_test_visa", true));

    const result = await actor.handleWebhook("customer.updated", "{}");

    expect(result).toEqual({ applied: false, transition: null, status: "captured", version: 3 });
  });

  it("moves a captured payment to disputed on a chargeback", async () => {
    const { directory } = createHarness();
    const actor = directory.stripe("org_cb", "pi_cb");
    await actor.authorize(cardPayment("tok_test_visa", true));

    const result = await actor.handleWebhook("charge.dispute.created", "{}");

    expect(result.applied).toBe(true);
    expect(result.status).toBe("disputed");
  });

  it("keeps the payment outcome when the payment intent notification fails", async () => {
    const { directory, notifier } = createHarness();
    notifier.failWith(new Error("notifier down"));

    const result = await directory.stripe("org_f", "pi_f").authorize(cardPayment("tok_test_visa", true));

    expect(result.status).toBe("captured");
    expect(notifier.authorizations).toHaveLength(0);
    expect(notifier.captures).toHaveLength(0);
  });

  it("re-applies a webhook on the record another instance committed first", async () => {
    const store = new InterleavingAttemptStore();
    const first = createHarness({ store });
    const second = createHarness({ store });
    const actor = first.directory.stripe("org_cc", "pi_cc");
    await actor.authorize(cardPayment("tok_test_3ds", false));

    store.beforeNextSave = async () => {
      await second.directory.stripe("org_cc", "pi_cc").handleWebhook("payment_intent.payment_failed", "{}", "evt_fail");
    };
    const result = await actor.handleWebhook("payment_intent.succeeded", "{}", "evt_ok");

    expect(result).toEqual({ applied: false, transition: "authorization_completed", status: "failed", version: 4 });
    const state = await actor.getState();
    expect(state.events.map((event) => event.type)).toEqual([
      "authorization_requires_action",
      "payment_intent.payment_failed",
      "payment_intent.succeeded",
    ]);
  });

  it("gives up with a processing error when every commit loses", async () => {
    const store = new ContendedAttemptStore();
    const { directory, stripeApi } = createHarness({ store });
    const actor = directory.stripe("org_g", "pi_g");
    await actor.authorize(cardPayment("tok_test_visa", false));

    store.contended = true;
    const result = await actor.capture("pi_sandbox_1");

    expect(result.success).toBe(false);
    expect(result.code).toBe("processing_error");
    expect(result.message).toBe("attempt_version_conflict");
    expect(result.status).toBe("authorized");
    expect(stripeApi.calls.map((call) => call.method)).toEqual(["createPaymentIntent"]);
  });

  it("serializes concurrent operations on one attempt", async () => {
    const { directory, stripeApi } = createHarness();
    const actor = directory.stripe("org_m", "pi_m");
    await actor.authorize(cardPayment("tok_test_visa", false));

    const [first, second] = await Promise.all([actor.capture("pi_sandbox_1"), actor.capture("pi_sandbox_1")]);

    expect(first.status).toBe("captured");
    expect(first.success).toBe(true);
    expect(second.code).toBe("invalid_state");
    expect(stripeApi.calls.filter((call) => call.method === "capturePaymentIntent")).toHaveLength(1);
  });

  describe("card network A extras", () => {
    it("authorizes on behalf of a connected account", async () => {
      const { directory, store } = createHarness();
      const actor = directory.stripe("org_ca", "pi_ca");

      const result = await actor.authorizeOnBehalfOf(cardPayment("tok_test_visa", false), "acct_1", 100);

      expect(result.status).toBe("authorized");
      const record = await store.get("org_ca:stripe:pi_ca");
      expect(record?.connected_account_id).toBe("acct_1");
      expect(record?.application_fee).toBe(100);
    });

    it("rejects an application fee above the amount", async () => {
      const { directory, stripeApi } = createHarness();

      const result = await directory.stripe("org_ca", "pi_fee").authorizeOnBehalfOf(cardPayment("tok_test_visa", false), "acct_1", 1200);

      expect(result.code).toBe("invalid_amount");
      expect(result.message).toBe("Application fee must be an integer between 0 and the amount.");
      expect(stripeApi.calls).toHaveLength(0);
    });

    it("creates a setup intent for a customer", async () => {
      const { directory } = createHarness();

      const result = await directory.stripe("org_si", "pi_si").createSetupIntent("cus_1");

      expect(result).toEqual({
        success: true,
        transaction_id: "seti_sandbox_1",
        code: null,
        message: null,
        setup_intent_id: "seti_sandbox_1",
        client_secret: "seti_sandbox_1_secret_cus_1",
      });
    });
  });

  describe("card network B extras", () => {
    it("splits an authorization between accounts", async () => {
      const { directory } = createHarness();
      const actor = directory.adyen("org_sp", "pi_sp");
      const splits = [
        { account: "BA_seller", amount: 900, type: "sub_merchant" as const, reference: null },
        { account: "platform", amount: 100, type: "commission" as const, reference: null },
      ];

      const result = await actor.authorizeWithSplit(cardPayment("tok_test_visa", false), splits);

      expect(result.status).toBe("authorized");
      expect(result.transaction_id).toBe("PSP_SANDBOX_1");
      expect(result.authorization_code).toBe("100001");
      expect(result.network_transaction_id).toBe("NTX1");
      expect((await actor.getState()).splits).toEqual(splits);
    });

    it("rejects splits that do not add up to the amount", async () => {
      const { directory, adyenApi } = createHarness();

      const result = await directory.adyen("org_sp", "pi_bad").authorizeWithSplit(cardPayment("tok_test_visa", false), [
        { account: "BA_seller", amount: 900, type: "sub_merchant", reference: null },
      ]);

      expect(result.code).toBe("invalid_split");
      expect(result.message).toBe("Split amounts must be positive and add up to 1000; got 900.");
      expect(adyenApi.calls).toHaveLength(0);
    });

    it("leaves a received payment pending until the notification arrives", async () => {
      const { directory, notifier } = createHarness();
      const actor = directory.adyen("org_pe", "pi_pe");

      const pending = await actor.authorize(cardPayment("tok_test_pending", false));
      expect(pending.success).toBe(false);
      expect(pending.code).toBe("pending");
      expect(pending.status).toBe("pending");
      expect(pending.transaction_id).toBe("PSP_SANDBOX_1");

      const completed = await actor.handleWebhook("AUTHORISATION", JSON.stringify({ success: "true" }));
      expect(completed).toEqual({ applied: true, transition: "authorization_completed", status: "authorized", version: 3 });
      expect(notifier.authorizations).toEqual([
        { orgId: "org_pe", paymentIntentId: "pi_pe", providerReference: "PSP_SANDBOX_1", authCode: null },
      ]);
    });

    it("treats an acknowledged refund as accepted", async () => {
      const { directory } = createHarness();
      const actor = directory.adyen("org_ar", "pi_ar");
      await actor.authorize(cardPayment("tok_test_visa", true));

      const refunded = await actor.refund("PSP_SANDBOX_1", 1000);

      expect(refunded.status).toBe("refunded");
      expect(refunded.refund_id).toBe("MOD_SANDBOX_2");
    });

    it("flags an acknowledged refund the network later reports as failed", async () => {
      const { directory } = createHarness();
      const actor = directory.adyen("org_rf", "pi_rf");
      await actor.authorize(cardPayment("tok_test_visa", true));
      await actor.refund("PSP_SANDBOX_1", 400);
      const payload = JSON.stringify({ eventCode: "REFUND", success: "false", pspReference: "MOD_SANDBOX_2", originalReference: "PSP_SANDBOX_1" });

      const handled = await actor.handleWebhook("REFUND", payload, "MOD_SANDBOX_2:REFUND");
      const state = await actor.getState();

      expect(handled).toMatchObject({ applied: true, transition: "refund_failed", status: "captured" });
      expect(state.refunded_amount).toBe(400);
      expect(state.last_error_code).toBe("refund_failed");
      expect(state.events.at(-1)?.payload).toBe(payload);
    });
  });
});
