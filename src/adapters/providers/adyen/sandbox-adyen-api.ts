import type {
  AdyenApi,
  AdyenModificationRequest,
  AdyenModificationResponse,
  AdyenPaymentRequest,
  AdyenPaymentResponse,
  AdyenRequestOptions,
  AdyenResponse,
  AdyenServiceError,
  AdyenTerminalAssignment,
} from "./adyen-api.js";

export interface RecordedAdyenCall {
  method: string;
  idempotencyKey: string;
}

interface SandboxPayment {
  pspReference: string;
  value: number;
  captured: number;
  refunded: number;
  state: "authorised" | "captured" | "cancelled" | "pending" | "action";
}

function fail<TBody>(error: AdyenServiceError): AdyenResponse<TBody> {
  return { ok: false, error };
}

function unprocessable<TBody>(errorCode: string, message: string): AdyenResponse<TBody> {
  return fail({ status: 422, errorCode, errorType: "validation", message });
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("Request aborted.")), { once: true });
  });
}

/**
 * In-process stand-in for card network B. Same `tok_test_*` vocabulary as the
 * network A sandbox; modifications answer `received` and update the ledger
 * immediately.
 */
export class SandboxAdyenApi implements AdyenApi {
  readonly calls: RecordedAdyenCall[] = [];
  private readonly payments_ = new Map<string, SandboxPayment>();
  private readonly paymentReplays = new Map<string, AdyenResponse<AdyenPaymentResponse>>();
  private readonly modificationReplays = new Map<string, AdyenResponse<AdyenModificationResponse>>();
  private readonly terminalReplays = new Map<string, AdyenResponse<AdyenTerminalAssignment>>();
  private readonly lostOnce = new Set<string>();
  private sequence = 0;

  get paymentCount(): number {
    return this.payments_.size;
  }

  async payments(
    request: AdyenPaymentRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenPaymentResponse>> {
    const token = request.paymentMethod.storedPaymentMethodId;
    if (token.includes("tok_test_timeout")) {
      this.record("payments", options);
      return waitForAbort(options.signal);
    }

    const response = this.replay(this.paymentReplays, options.idempotencyKey, "payments", options, () =>
      this.newPayment(request),
    );
    if (token.includes("tok_test_lost_response") && !this.lostOnce.has(options.idempotencyKey)) {
      this.lostOnce.add(options.idempotencyKey);
      throw new Error("socket hang up");
    }
    return response;
  }

  async captures(
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenModificationResponse>> {
    return this.modify(`capture:${options.idempotencyKey}`, "captures", pspReference, request, options, (payment, value) => {
      if (payment.state !== "authorised" || value > payment.value) {
        return "Original pspReference is not in a capturable state.";
      }
      payment.state = "captured";
      payment.captured = value;
      return null;
    });
  }

  async refunds(
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenModificationResponse>> {
    return this.modify(`refund:${options.idempotencyKey}`, "refunds", pspReference, request, options, (payment, value) => {
      if (payment.state !== "captured" || payment.refunded + value > payment.captured) {
        return "Refund amount exceeds the captured balance.";
      }
      payment.refunded += value;
      return null;
    });
  }

  async cancels(
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenModificationResponse>> {
    return this.modify(`cancel:${options.idempotencyKey}`, "cancels", pspReference, request, options, (payment) => {
      if (payment.state !== "authorised") {
        return "Original pspReference cannot be cancelled.";
      }
      payment.state = "cancelled";
      return null;
    });
  }

  async assignTerminal(
    request: { registrationCode: string; storeId?: string; merchantAccount: string },
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenTerminalAssignment>> {
    return this.replay(this.terminalReplays, options.idempotencyKey, "assignTerminal", options, () => {
      if (request.registrationCode.startsWith("invalid")) {
        return unprocessable("000", "Terminal registration code is not recognised.");
      }
      return {
        ok: true,
        body: {
          terminalId: `V400m-SANDBOX${this.nextSequence()}`,
          merchantAccount: request.merchantAccount,
          status: request.storeId ? "Assigned" : "AssignmentScheduled",
          ...(request.storeId ? { storeId: request.storeId } : {}),
        },
      };
    });
  }

  private newPayment(request: AdyenPaymentRequest): AdyenResponse<AdyenPaymentResponse> {
    const token = request.paymentMethod.storedPaymentMethodId;
    if (token.includes("tok_test_unavailable")) {
      return fail({ status: 500, errorCode: "901", errorType: "internal", message: "Internal error." });
    }

    const pspReference = `PSP_SANDBOX_${this.nextSequence()}`;
    const amount = { ...request.amount };
    if (token.includes("tok_test_decline")) {
      return { ok: true, body: { pspReference, resultCode: "Refused", refusalReason: "Refused", refusalReasonCode: "2" } };
    }
    if (token.includes("tok_test_insufficient")) {
      return {
        ok: true,
        body: { pspReference, resultCode: "Refused", refusalReason: "Not enough balance", refusalReasonCode: "12" },
      };
    }

    const payment: SandboxPayment = { pspReference, value: amount.value, captured: 0, refunded: 0, state: "authorised" };
    this.payments_.set(pspReference, payment);

    if (token.includes("tok_test_3ds")) {
      payment.state = "action";
      return {
        ok: true,
        body: {
          pspReference,
          resultCode: "RedirectShopper",
          amount,
          action: { type: "redirect", url: `https://sandbox.invalid/3ds/${pspReference}`, paymentData: `pd_${pspReference}` },
        },
      };
    }
    if (token.includes("tok_test_pending")) {
      payment.state = "pending";
      return { ok: true, body: { pspReference, resultCode: "Received", amount } };
    }
    if (request.additionalData?.manualCapture !== "true") {
      payment.state = "captured";
      payment.captured = amount.value;
    }
    return {
      ok: true,
      body: {
        pspReference,
        resultCode: "Authorised",
        amount,
        additionalData: { authCode: String(100000 + this.sequence), networkTxReference: `NTX${this.sequence}` },
      },
    };
  }

  private modify(
    replayKey: string,
    method: string,
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
    apply: (payment: SandboxPayment, value: number) => string | null,
  ): AdyenResponse<AdyenModificationResponse> {
    return this.replay(this.modificationReplays, replayKey, method, options, () => {
      const payment = this.payments_.get(pspReference);
      if (!payment) {
        return unprocessable("167", `Original pspReference '${pspReference}' is unknown.`);
      }
      const value = request.amount?.value ?? payment.value;
      const problem = apply(payment, value);
      if (problem) {
        return unprocessable("167", problem);
      }
      return {
        ok: true,
        body: {
          pspReference: `MOD_SANDBOX_${this.nextSequence()}`,
          paymentPspReference: pspReference,
          status: "received",
          ...(request.amount ? { amount: { ...request.amount } } : {}),
        },
      };
    });
  }

  private replay<TBody>(
    replays: Map<string, AdyenResponse<TBody>>,
    replayKey: string,
    method: string,
    options: AdyenRequestOptions,
    produce: () => AdyenResponse<TBody>,
  ): AdyenResponse<TBody> {
    this.record(method, options);
    const stored = replays.get(replayKey);
    if (stored) {
      return stored;
    }
    const response = produce();
    replays.set(replayKey, response);
    return response;
  }

  private record(method: string, options: AdyenRequestOptions): void {
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
