import type {
  StripeApi,
  StripeConnectionToken,
  StripeError,
  StripePaymentIntent,
  StripePaymentIntentCreateParams,
  StripeRefund,
  StripeRequestOptions,
  StripeResponse,
  StripeSetupIntent,
  StripeTerminalReader,
} from "./stripe-api.js";

export interface RecordedStripeCall {
  method: string;
  idempotencyKey: string;
}

function fail<TBody>(status: number, error: StripeError): StripeResponse<TBody> {
  return { ok: false, status, error };
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("Request aborted.")), { once: true });
  });
}

/**
 * In-process stand-in for card network A. Replays the stored response for a
 * repeated idempotency key, the way the network deduplicates retries, and picks
 * its behaviour from `tok_test_*` payment method tokens.
 */
export class SandboxStripeApi implements StripeApi {
  readonly calls: RecordedStripeCall[] = [];
  private readonly intents = new Map<string, StripePaymentIntent>();
  private readonly refundedByIntent = new Map<string, number>();
  private readonly intentReplays = new Map<string, StripeResponse<StripePaymentIntent>>();
  private readonly refundReplays = new Map<string, StripeResponse<StripeRefund>>();
  private readonly setupReplays = new Map<string, StripeResponse<StripeSetupIntent>>();
  private readonly readerReplays = new Map<string, StripeResponse<StripeTerminalReader>>();
  private readonly lostOnce = new Set<string>();
  private sequence = 0;

  get paymentIntentCount(): number {
    return this.intents.size;
  }

  async createPaymentIntent(
    params: StripePaymentIntentCreateParams,
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>> {
    const token = params.payment_method;
    if (token.includes("tok_test_timeout")) {
      this.record("createPaymentIntent", options);
      return waitForAbort(options.signal);
    }

    const response = this.replay(this.intentReplays, `create:${options.idempotencyKey}`, "createPaymentIntent", options, () =>
      this.newPaymentIntent(params),
    );
    if (token.includes("tok_test_lost_response") && !this.lostOnce.has(options.idempotencyKey)) {
      this.lostOnce.add(options.idempotencyKey);
      throw new Error("socket hang up");
    }
    return response;
  }

  async capturePaymentIntent(
    id: string,
    params: { amount_to_capture: number },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>> {
    return this.replay(this.intentReplays, `capture:${options.idempotencyKey}`, "capturePaymentIntent", options, () => {
      const intent = this.intents.get(id);
      if (!intent) {
        return fail(404, { type: "invalid_request_error", code: "resource_missing", message: `No such payment_intent: '${id}'` });
      }
      if (intent.status !== "requires_capture" || params.amount_to_capture > intent.amount_capturable) {
        return fail(400, {
          type: "invalid_request_error",
          code: "payment_intent_unexpected_state",
          message: `This PaymentIntent could not be captured because it has a status of ${intent.status}.`,
        });
      }
      intent.status = "succeeded";
      intent.amount_received = params.amount_to_capture;
      intent.amount_capturable = 0;
      return { ok: true, body: { ...intent } };
    });
  }

  async cancelPaymentIntent(
    id: string,
    _params: { cancellation_reason?: string },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>> {
    return this.replay(this.intentReplays, `cancel:${options.idempotencyKey}`, "cancelPaymentIntent", options, () => {
      const intent = this.intents.get(id);
      if (!intent || intent.status === "succeeded" || intent.status === "canceled") {
        return fail(400, {
          type: "invalid_request_error",
          code: "payment_intent_unexpected_state",
          message: `PaymentIntent '${id}' cannot be canceled.`,
        });
      }
      intent.status = "canceled";
      intent.amount_capturable = 0;
      return { ok: true, body: { ...intent } };
    });
  }

  async createRefund(
    params: { payment_intent: string; amount: number },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeRefund>> {
    return this.replay(this.refundReplays, options.idempotencyKey, "createRefund", options, () => {
      const intent = this.intents.get(params.payment_intent);
      const refunded = this.refundedByIntent.get(params.payment_intent) ?? 0;
      if (!intent || intent.status !== "succeeded" || refunded + params.amount > intent.amount_received) {
        return fail(400, {
          type: "invalid_request_error",
          code: "charge_already_refunded",
          message: "Refund amount exceeds the refundable balance.",
        });
      }
      this.refundedByIntent.set(params.payment_intent, refunded + params.amount);
      return {
        ok: true,
        body: {
          id: `re_sandbox_${this.nextSequence()}`,
          object: "refund",
          amount: params.amount,
          status: "succeeded",
          payment_intent: params.payment_intent,
        },
      };
    });
  }

  async createSetupIntent(
    params: { customer: string },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeSetupIntent>> {
    return this.replay(this.setupReplays, options.idempotencyKey, "createSetupIntent", options, () => {
      const id = `seti_sandbox_${this.nextSequence()}`;
      return {
        ok: true,
        body: { id, object: "setup_intent", client_secret: `${id}_secret_${params.customer}`, status: "requires_payment_method" },
      };
    });
  }

  async createTerminalReader(
    params: { registration_code: string; label: string },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeTerminalReader>> {
    return this.replay(this.readerReplays, options.idempotencyKey, "createTerminalReader", options, () => {
      if (params.registration_code.startsWith("invalid")) {
        return fail(400, {
          type: "invalid_request_error",
          code: "terminal_reader_registration_code_invalid",
          message: "The registration code is invalid.",
        });
      }
      return {
        ok: true,
        body: {
          id: `tmr_sandbox_${this.nextSequence()}`,
          object: "terminal.reader",
          label: params.label,
          status: "online",
          device_type: "bbpos_wisepos_e",
          serial_number: `SN-${params.registration_code}`,
        },
      };
    });
  }

  async createConnectionToken(
    params: { location?: string },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeConnectionToken>> {
    this.record("createConnectionToken", options);
    return {
      ok: true,
      body: { object: "terminal.connection_token", secret: `pst_sandbox_${params.location ?? "any"}_${this.nextSequence()}` },
    };
  }

  private newPaymentIntent(params: StripePaymentIntentCreateParams): StripeResponse<StripePaymentIntent> {
    const token = params.payment_method;
    if (token.includes("tok_test_unavailable")) {
      return fail(503, { type: "api_error", message: "An error occurred with our connection to the network." });
    }
    if (token.includes("tok_test_decline") || token.includes("tok_test_insufficient")) {
      const declineCode = token.includes("tok_test_insufficient") ? "insufficient_funds" : "generic_decline";
      return fail(402, {
        type: "card_error",
        code: "card_declined",
        decline_code: declineCode,
        message: "Your card was declined.",
      });
    }

    const id = `pi_sandbox_${this.nextSequence()}`;
    const intent: StripePaymentIntent = {
      id,
      object: "payment_intent",
      status: "requires_capture",
      amount: params.amount,
      amount_capturable: params.amount,
      amount_received: 0,
      currency: params.currency,
      latest_charge: `ch_sandbox_${this.sequence}`,
      client_secret: `${id}_secret`,
      next_action: null,
      last_payment_error: null,
    };

    if (token.includes("tok_test_3ds")) {
      intent.status = "requires_action";
      intent.amount_capturable = 0;
      intent.latest_charge = null;
      intent.next_action = {
        type: "redirect_to_url",
        redirect_to_url: { url: `https://sandbox.invalid/3ds/${id}`, return_url: null },
      };
    } else if (token.includes("tok_test_pending")) {
      intent.status = "processing";
      intent.amount_capturable = 0;
    } else if (params.capture_method === "automatic") {
      intent.status = "succeeded";
      intent.amount_capturable = 0;
      intent.amount_received = params.amount;
    }

    this.intents.set(id, intent);
    return { ok: true, body: { ...intent } };
  }

  private replay<TBody>(
    replays: Map<string, StripeResponse<TBody>>,
    replayKey: string,
    method: string,
    options: StripeRequestOptions,
    produce: () => StripeResponse<TBody>,
  ): StripeResponse<TBody> {
    this.record(method, options);
    const stored = replays.get(replayKey);
    if (stored) {
      return stored;
    }
    const response = produce();
    replays.set(replayKey, response);
    return response;
  }

  private record(method: string, options: StripeRequestOptions): void {
    if (options.signal.aborted) {
      throw new Error("Request aborted.");
    }
    this.calls.push({ method, idempotencyKey: options.idempotencyKey });
  }

  private nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }
}
