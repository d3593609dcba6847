import { MERCHANT_REFERENCE_PREFIX } from "../../../domain/attempt-key.js";
import type { NextAction, SplitAllocation, SplitType } from "../../../domain/types.js";
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
  WebhookAttemptHint,
  WebhookTransition,
} from "../../../ports/provider-client.js";
import { isJsonObject, parseJsonObject, readObject, readString, type JsonObject } from "../json.js";
import { verifyAdyenSignature } from "../webhook-signatures.js";
import type {
  AdyenAction,
  AdyenApi,
  AdyenPaymentRequest,
  AdyenPaymentResponse,
  AdyenServiceError,
  AdyenSplitType,
} from "./adyen-api.js";

export interface AdyenClientOptions {
  merchantAccount: string;
}

// Keyed by refusalReasonCode.
const REFUSAL_CODES: Record<string, string> = {
  "2": "card_declined",
  "4": "acquirer_error",
  "5": "blocked_card",
  "6": "expired_card",
  "8": "invalid_card",
  "9": "issuer_unavailable",
  "12": "insufficient_funds",
  "14": "fraudulent",
  "20": "fraudulent",
  "24": "incorrect_cvc",
  "25": "blocked_card",
  "27": "do_not_honor",
};

const SPLIT_TYPES: Record<SplitType, AdyenSplitType> = {
  sub_merchant: "BalanceAccount",
  commission: "Commission",
  fee: "PaymentFee",
  tax: "VAT",
};

function serviceFailure(error: AdyenServiceError, reference: string | null): FailedOutcome {
  let errorCode = "invalid_request";
  if (error.status === 429) {
    errorCode = "rate_limit";
  } else if (error.status >= 500) {
    errorCode = "provider_unavailable";
  } else if (error.errorType === "security" || error.errorType === "configuration") {
    errorCode = "configuration_error";
  }
  return {
    success: false,
    status: "failed",
    reference,
    errorCode,
    errorMessage: error.message,
    providerCode: error.errorCode,
  };
}

function refusal(response: AdyenPaymentResponse): DeclinedOutcome {
  const providerCode = response.refusalReasonCode ?? null;
  return {
    success: false,
    status: "declined",
    reference: response.pspReference ?? null,
    errorCode: REFUSAL_CODES[providerCode ?? ""] ?? "card_declined",
    errorMessage: response.refusalReason ?? "Refused",
    providerCode,
  };
}

function unsupported(operation: string): FailedOutcome {
  return {
    success: false,
    status: "failed",
    reference: null,
    errorCode: "unsupported_operation",
    errorMessage: `Card network B does not support ${operation}.`,
    providerCode: null,
  };
}

// Payments go out with `pi_ref_{paymentIntentId}`, so an early notification still names its attempt.
function attemptHintFrom(item: JsonObject): WebhookAttemptHint | null {
  const merchantReference = readString(item, "merchantReference");
  if (!merchantReference?.startsWith(MERCHANT_REFERENCE_PREFIX)) {
    return null;
  }
  const paymentIntentId = merchantReference.slice(MERCHANT_REFERENCE_PREFIX.length);
  if (!paymentIntentId) {
    return null;
  }
  const additionalData = readObject(item, "additionalData");
  return { paymentIntentId, orgId: additionalData ? readString(additionalData, "metadata.org_id") : null };
}

function toNextAction(action: AdyenAction | undefined): NextAction {
  const data: Record<string, string> = action?.paymentData ? { payment_data: action.paymentData } : {};
  if (action?.url) {
    return { type: "redirect_to_url", redirect_url: action.url, data };
  }
  return { type: "challenge_shopper", redirect_url: null, data };
}

/**
 * Normalizes card-network B responses. Modifications are acknowledged as
 * `received` and treated as accepted; the notification confirms them later.
 */
export class AdyenProviderClient implements ProviderClientPort {
  readonly name = "adyen" as const;

  constructor(
    private readonly api: AdyenApi,
    private readonly options: AdyenClientOptions,
  ) {}

  createPayment(input: CreatePaymentInput, options: ProviderCallOptions): Promise<PaymentOutcome> {
    return this.pay(this.paymentRequest(input), input, options);
  }

  createSplitPayment(
    input: CreatePaymentInput,
    splits: SplitAllocation[],
    options: ProviderCallOptions,
  ): Promise<PaymentOutcome> {
    const request: AdyenPaymentRequest = {
      ...this.paymentRequest(input),
      splits: splits.map((split, index) => ({
        ...(split.type === "commission" ? {} : { account: split.account }),
        amount: { value: split.amount },
        type: SPLIT_TYPES[split.type],
        reference: split.reference ?? `${input.reference}_split_${index + 1}`,
      })),
    };
    return this.pay(request, input, options);
  }

  async capture(input: CaptureInput, options: ProviderCallOptions): Promise<CaptureOutcome> {
    const response = await this.api.captures(
      input.reference,
      {
        merchantAccount: this.options.merchantAccount,
        reference: `${input.reference}_capture`,
        amount: { value: input.amount, currency: input.currency.toUpperCase() },
      },
      options,
    );
    if (!response.ok) {
      return serviceFailure(response.error, input.reference);
    }
    return {
      success: true,
      status: "captured",
      reference: response.body.pspReference,
      amount: response.body.amount?.value ?? input.amount,
    };
  }

  async refund(input: RefundInput, options: ProviderCallOptions): Promise<RefundOutcome> {
    const response = await this.api.refunds(
      input.reference,
      {
        merchantAccount: this.options.merchantAccount,
        reference: `${input.reference}_refund`,
        amount: { value: input.amount, currency: input.currency.toUpperCase() },
      },
      options,
    );
    if (!response.ok) {
      return serviceFailure(response.error, input.reference);
    }
    return {
      success: true,
      status: "pending",
      reference: response.body.pspReference,
      amount: response.body.amount?.value ?? input.amount,
    };
  }

  async cancel(input: CancelInput, options: ProviderCallOptions): Promise<CancelOutcome> {
    const response = await this.api.cancels(
      input.reference,
      { merchantAccount: this.options.merchantAccount, reference: `${input.reference}_cancel` },
      options,
    );
    if (!response.ok) {
      return serviceFailure(response.error, input.reference);
    }
    return { success: true, status: "canceled", reference: response.body.pspReference };
  }

  async createSetupIntent(_customerId: string, _options: ProviderCallOptions): Promise<SetupIntentOutcome> {
    return unsupported("setup intents");
  }

  async pairTerminal(input: PairTerminalInput, options: ProviderCallOptions): Promise<TerminalPairingOutcome> {
    const response = await this.api.assignTerminal(
      {
        registrationCode: input.registrationCode,
        merchantAccount: input.merchantAccount ?? this.options.merchantAccount,
        ...(input.locationId ? { storeId: input.locationId } : {}),
      },
      options,
    );
    if (!response.ok) {
      return serviceFailure(response.error, null);
    }
    return {
      success: true,
      status: "paired",
      reference: response.body.terminalId,
      readerStatus: response.body.status,
    };
  }

  async createConnectionToken(
    _locationId: string | undefined,
    _options: ProviderCallOptions,
  ): Promise<ConnectionTokenOutcome> {
    return unsupported("connection tokens");
  }

  verifyWebhookSignature(rawPayload: string, signature: string, secret: string): boolean {
    return verifyAdyenSignature(secret, signature, rawPayload);
  }

  parseWebhook(rawPayload: string): InboundWebhookEvent[] {
    const body = parseJsonObject(rawPayload);
    const items = body?.notificationItems;
    if (!Array.isArray(items)) {
      throw new SyntaxError("Webhook body is not a card network B notification.");
    }

    return items.map((entry: unknown) => {
      const item = isJsonObject(entry) ? readObject(entry, "NotificationRequestItem") : null;
      const eventCode = item ? readString(item, "eventCode") : null;
      const pspReference = item ? readString(item, "pspReference") : null;
      if (!item || !eventCode || !pspReference) {
        throw new SyntaxError("Notification item is missing eventCode or pspReference.");
      }
      return {
        eventType: eventCode,
        providerReference: readString(item, "originalReference") ?? pspReference,
        externalEventId: `${pspReference}:${eventCode}`,
        attemptHint: attemptHintFrom(item),
        rawPayload: JSON.stringify(item),
      };
    });
  }

  translateWebhookEvent(eventType: string, rawPayload: string): WebhookTransition | null {
    const item = parseJsonObject(rawPayload);
    const succeeded = item ? readString(item, "success") === "true" : false;
    switch (eventType) {
      case "AUTHORISATION":
        return succeeded ? "authorization_completed" : "payment_failed";
      case "CAPTURE":
        return succeeded ? "capture_completed" : null;
      case "CANCELLATION":
        return succeeded ? "canceled" : null;
      case "REFUND":
        return succeeded ? "refund_notice" : "refund_failed";
      case "CHARGEBACK":
        return "chargeback";
      default:
        return null;
    }
  }

  private paymentRequest(input: CreatePaymentInput): AdyenPaymentRequest {
    return {
      amount: { value: input.amount, currency: input.currency.toUpperCase() },
      reference: input.reference,
      merchantAccount: this.options.merchantAccount,
      paymentMethod: { type: "scheme", storedPaymentMethodId: input.paymentMethodToken },
      ...(input.statementDescriptor ? { shopperStatement: input.statementDescriptor } : {}),
      ...(input.metadata ? { metadata: input.metadata } : {}),
      ...(input.autoCapture ? {} : { additionalData: { manualCapture: "true" } }),
    };
  }

  private async pay(
    request: AdyenPaymentRequest,
    input: CreatePaymentInput,
    options: ProviderCallOptions,
  ): Promise<PaymentOutcome> {
    const response = await this.api.payments(request, options);
    if (!response.ok) {
      return serviceFailure(response.error, null);
    }

    const payment = response.body;
    const reference = payment.pspReference ?? null;
    const amount = payment.amount?.value ?? input.amount;
    switch (payment.resultCode) {
      case "Authorised":
        if (!reference) {
          break;
        }
        return {
          success: true,
          status: input.autoCapture ? "captured" : "authorized",
          reference,
          amount,
          authCode: payment.additionalData?.authCode ?? null,
          networkTransactionId: payment.additionalData?.networkTxReference ?? null,
        };
      case "Pending":
      case "Received":
        if (!reference) {
          break;
        }
        return { success: true, status: "pending", reference, amount };
      case "RedirectShopper":
      case "IdentifyShopper":
      case "ChallengeShopper":
        if (!reference) {
          break;
        }
        return {
          success: false,
          status: "requires_action",
          reference,
          amount,
          nextAction: toNextAction(payment.action),
        };
      case "Refused":
        return refusal(payment);
      case "Cancelled":
        return {
          success: false,
          status: "declined",
          reference,
          errorCode: "canceled_by_shopper",
          errorMessage: "The shopper cancelled the payment.",
          providerCode: payment.resultCode,
        };
      case "Error":
        return {
          success: false,
          status: "failed",
          reference,
          errorCode: "processing_error",
          errorMessage: payment.refusalReason ?? "The network reported an error.",
          providerCode: payment.resultCode,
        };
    }
    return {
      success: false,
      status: "failed",
      reference,
      errorCode: "processing_error",
      errorMessage: `Result '${payment.resultCode}' arrived without a PSP reference.`,
      providerCode: payment.resultCode,
    };
  }
}
