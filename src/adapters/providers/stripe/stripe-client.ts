import type { NextAction, SplitAllocation } from "../../../domain/types.js";
import type {
  CancelInput,
  CancelOutcome,
  CaptureInput,
  CaptureOutcome,
  ConnectionTokenOutcome,
  CreatePaymentInput,
  DeclinedOutcome,
  FailedOutcome,
  InboundWebhookEvent,
  PairTerminalInput,
  PaymentOutcome,
  ProviderCallOptions,
  ProviderClientPort,
  RefundInput,
  RefundOutcome,
  SetupIntentOutcome,
  TerminalPairingOutcome,
  WebhookTransition,
} from "../../../ports/provider-client.js";
import { parseJsonObject, readObject, readString } from "../json.js";
import { verifyStripeSignature } from "../webhook-signatures.js";
import type {
  StripeApi,
  StripeCancellationReason,
  StripeError,
  StripeNextAction,
  StripePaymentIntent,
  StripeRefundReason,
} from "./stripe-api.js";

const DECLINE_CODES: Record<string, string> = {
  generic_decline: "card_declined",
  card_declined: "card_declined",
  insufficient_funds: "insufficient_funds",
  expired_card: "expired_card",
  incorrect_cvc: "incorrect_cvc",
  fraudulent: "fraudulent",
  lost_card: "blocked_card",
  stolen_card: "blocked_card",
  pickup_card: "blocked_card",
  do_not_honor: "do_not_honor",
  incorrect_number: "invalid_card",
  invalid_number: "invalid_card",
  issuer_not_available: "issuer_unavailable",
  processing_error: "processing_error",
  try_again_later: "issuer_unavailable",
};

const WEBHOOK_TRANSITIONS: Record<string, WebhookTransition> = {
  "payment_intent.succeeded": "authorization_completed",
  "payment_intent.amount_capturable_updated": "authorization_completed",
  "payment_intent.payment_failed": "payment_failed",
  "payment_intent.canceled": "canceled",
  "charge.captured": "capture_completed",
  "charge.refunded": "refund_notice",
  "refund.failed": "refund_failed",
  "charge.dispute.created": "chargeback",
};

const CANCELLATION_REASONS: readonly StripeCancellationReason[] = [
  "duplicate",
  "fraudulent",
  "requested_by_customer",
  "abandoned",
];
const REFUND_REASONS: readonly StripeRefundReason[] = ["duplicate", "fraudulent", "requested_by_customer"];

function rejection(error: StripeError, reference: string | null): DeclinedOutcome | FailedOutcome {
  const providerCode = error.decline_code ?? error.code ?? null;
  switch (error.type) {
    case "card_error":
      return {
        success: false,
        status: "declined",
        reference,
        errorCode: DECLINE_CODES[providerCode ?? ""] ?? "card_declined",
        errorMessage: error.message,
        providerCode,
      };
    case "rate_limit_error":
      return { success: false, status: "failed", reference, errorCode: "rate_limit", errorMessage: error.message, providerCode };
    case "api_connection_error":
      return {
        success: false,
        status: "failed",
        reference,
        errorCode: "api_connection_error",
        errorMessage: error.message,
        providerCode,
      };
    case "api_error":
      return {
        success: false,
        status: "failed",
        reference,
        errorCode: "processing_error",
        errorMessage: error.message,
        providerCode,
      };
    case "idempotency_error":
      return {
        success: false,
        status: "failed",
        reference,
        errorCode: "idempotency_error",
        errorMessage: error.message,
        providerCode,
      };
    case "invalid_request_error":
      return {
        success: false,
        status: "failed",
        reference,
        errorCode: "invalid_request",
        errorMessage: error.message,
        providerCode,
      };
  }
}

function unsupported(operation: string): FailedOutcome {
  return {
    success: false,
    status: "failed",
    reference: null,
    errorCode: "unsupported_operation",
    errorMessage: `Card network A does not support ${operation}.`,
    providerCode: null,
  };
}

function toNextAction(action: StripeNextAction | null): NextAction {
  if (action?.type === "redirect_to_url") {
    return { type: "redirect_to_url", redirect_url: action.redirect_to_url.url, data: {} };
  }
  return { type: "use_sdk", redirect_url: null, data: action?.use_stripe_sdk ?? {} };
}

function pickReason<TReason extends string>(allowed: readonly TReason[], reason: string | undefined): TReason | undefined {
  return allowed.find((candidate) => candidate === reason);
}

/**
 * Normalizes card-network A responses. Currency goes out lowercase and comes
 * back uppercase; payment intent ids are the transaction references.
 */
export class StripeProviderClient implements ProviderClientPort {
  readonly name = "stripe" as const;

  constructor(private readonly api: StripeApi) {}

  async createPayment(input: CreatePaymentInput, options: ProviderCallOptions): Promise<PaymentOutcome> {
    const response = await this.api.createPaymentIntent(
      {
        amount: input.amount,
        currency: input.currency.toLowerCase(),
        payment_method: input.paymentMethodToken,
        confirm: true,
        capture_method: input.autoCapture ? "automatic" : "manual",
        ...(input.statementDescriptor ? { statement_descriptor: input.statementDescriptor } : {}),
        ...(input.metadata ? { metadata: input.metadata } : {}),
        ...(input.connectedAccountId
          ? { on_behalf_of: input.connectedAccountId, transfer_data: { destination: input.connectedAccountId } }
          : {}),
        ...(input.applicationFee !== undefined ? { application_fee_amount: input.applicationFee } : {}),
      },
      options,
    );
    if (!response.ok) {
      return rejection(response.error, response.error.payment_intent_id ?? null);
    }
    return this.paymentOutcome(response.body);
  }

  async createSplitPayment(
    _input: CreatePaymentInput,
    _splits: SplitAllocation[],
    _options: ProviderCallOptions,
  ): Promise<PaymentOutcome> {
    return unsupported("split payments");
  }

  async capture(input: CaptureInput, options: ProviderCallOptions): Promise<CaptureOutcome> {
    const response = await this.api.capturePaymentIntent(input.reference, { amount_to_capture: input.amount }, options);
    if (!response.ok) {
      return rejection(response.error, input.reference);
    }
    const intent = response.body;
    if (intent.status !== "succeeded") {
      return {
        success: false,
        status: "failed",
        reference: intent.id,
        errorCode: "invalid_request",
        errorMessage: `Payment intent is '${intent.status}' after capture.`,
        providerCode: intent.status,
      };
    }
    return { success: true, status: "captured", reference: intent.id, amount: intent.amount_received };
  }

  async refund(input: RefundInput, options: ProviderCallOptions): Promise<RefundOutcome> {
    const reason = pickReason(REFUND_REASONS, input.reason);
    const response = await this.api.createRefund(
      { payment_intent: input.reference, amount: input.amount, ...(reason ? { reason } : {}) },
      options,
    );
    if (!response.ok) {
      return rejection(response.error, input.reference);
    }
    const refund = response.body;
    if (refund.status === "failed" || refund.status === "canceled") {
      return {
        success: false,
        status: "declined",
        reference: refund.id,
        errorCode: "refund_failed",
        errorMessage: `Refund ended as '${refund.status}'.`,
        providerCode: refund.status,
      };
    }
    return {
      success: true,
      status: refund.status === "succeeded" ? "refunded" : "pending",
      reference: refund.id,
      amount: refund.amount,
    };
  }

  async cancel(input: CancelInput, options: ProviderCallOptions): Promise<CancelOutcome> {
    const reason = pickReason(CANCELLATION_REASONS, input.reason) ?? "requested_by_customer";
    const response = await this.api.cancelPaymentIntent(input.reference, { cancellation_reason: reason }, options);
    if (!response.ok) {
      return rejection(response.error, input.reference);
    }
    return { success: true, status: "canceled", reference: response.body.id };
  }

  async createSetupIntent(customerId: string, options: ProviderCallOptions): Promise<SetupIntentOutcome> {
    const response = await this.api.createSetupIntent({ customer: customerId, usage: "off_session" }, options);
    if (!response.ok) {
      return { ...rejection(response.error, null), status: "failed" };
    }
    return {
      success: true,
      status: "created",
      reference: response.body.id,
      clientSecret: response.body.client_secret,
    };
  }

  async pairTerminal(input: PairTerminalInput, options: ProviderCallOptions): Promise<TerminalPairingOutcome> {
    const response = await this.api.createTerminalReader(
      {
        registration_code: input.registrationCode,
        label: input.label,
        ...(input.locationId ? { location: input.locationId } : {}),
      },
      options,
    );
    if (!response.ok) {
      return { ...rejection(response.error, null), status: "failed" };
    }
    return { success: true, status: "paired", reference: response.body.id, readerStatus: response.body.status };
  }

  async createConnectionToken(
    locationId: string | undefined,
    options: ProviderCallOptions,
  ): Promise<ConnectionTokenOutcome> {
    const response = await this.api.createConnectionToken(locationId ? { location: locationId } : {}, options);
    if (!response.ok) {
      return { ...rejection(response.error, null), status: "failed" };
    }
    return { success: true, status: "issued", secret: response.body.secret };
  }

  verifyWebhookSignature(rawPayload: string, signature: string, secret: string): boolean {
    return verifyStripeSignature(secret, signature, rawPayload);
  }

  parseWebhook(rawPayload: string): InboundWebhookEvent[] {
    const event = parseJsonObject(rawPayload);
    const eventType = event ? readString(event, "type") : null;
    const object = event ? readObject(readObject(event, "data") ?? {}, "object") : null;
    if (!event || !eventType || !object) {
      throw new SyntaxError("Webhook body is not a card network A event.");
    }
    const providerReference = readString(object, "object") === "payment_intent"
      ? readString(object, "id")
      : readString(object, "payment_intent");
    if (!providerReference) {
      throw new SyntaxError(`Webhook '${eventType}' carries no payment intent reference.`);
    }
    const metadata = readObject(object, "metadata");
    const paymentIntentId = metadata ? readString(metadata, "payment_intent_id") : null;
    const attemptHint = metadata && paymentIntentId
      ? { paymentIntentId, orgId: readString(metadata, "org_id") }
      : null;
    return [{ eventType, providerReference, externalEventId: readString(event, "id"), attemptHint, rawPayload }];
  }

  translateWebhookEvent(eventType: string, _rawPayload: string): WebhookTransition | null {
    return WEBHOOK_TRANSITIONS[eventType] ?? null;
  }

  private paymentOutcome(intent: StripePaymentIntent): PaymentOutcome {
    switch (intent.status) {
      case "requires_action":
        return {
          success: false,
          status: "requires_action",
          reference: intent.id,
          amount: intent.amount,
          nextAction: toNextAction(intent.next_action),
        };
      case "processing":
        return { success: true, status: "pending", reference: intent.id, amount: intent.amount };
      case "requires_capture":
        return {
          success: true,
          status: "authorized",
          reference: intent.id,
          amount: intent.amount_capturable,
          authCode: null,
          networkTransactionId: intent.latest_charge,
        };
      case "succeeded":
        return {
          success: true,
          status: "captured",
          reference: intent.id,
          amount: intent.amount_received,
          authCode: null,
          networkTransactionId: intent.latest_charge,
        };
      case "requires_payment_method": {
        const lastError = intent.last_payment_error;
        const providerCode = lastError?.decline_code ?? lastError?.code ?? null;
        return {
          success: false,
          status: "declined",
          reference: intent.id,
          errorCode: DECLINE_CODES[providerCode ?? ""] ?? "card_declined",
          errorMessage: lastError?.message ?? "The payment method was declined.",
          providerCode,
        };
      }
      case "canceled":
      case "requires_confirmation":
        return {
          success: false,
          status: "failed",
          reference: intent.id,
          errorCode: "invalid_request",
          errorMessage: `Payment intent is '${intent.status}'.`,
          providerCode: intent.status,
        };
    }
  }
}
