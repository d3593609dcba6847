/**
 * Card-network B wire vocabulary: `{ value, currency }` amounts, PSP references,
 * and asynchronous modifications confirmed later by notification.
 */
export type AdyenResultCode =
  | "Authorised"
  | "Refused"
  | "Pending"
  | "Received"
  | "RedirectShopper"
  | "IdentifyShopper"
  | "ChallengeShopper"
  | "Error"
  | "Cancelled";

export interface AdyenAmount {
  value: number;
  currency: string;
}

export interface AdyenRequestOptions {
  idempotencyKey: string;
  signal: AbortSignal;
}

export interface AdyenServiceError {
  status: number;
  errorCode: string;
  errorType: "validation" | "security" | "configuration" | "internal";
  message: string;
}

export type AdyenResponse<TBody> = { ok: true; body: TBody } | { ok: false; error: AdyenServiceError };

export type AdyenSplitType = "BalanceAccount" | "Commission" | "PaymentFee" | "VAT";

export interface AdyenSplit {
  account?: string;
  amount: { value: number };
  type: AdyenSplitType;
  reference: string;
}

export interface AdyenPaymentRequest {
  amount: AdyenAmount;
  reference: string;
  merchantAccount: string;
  paymentMethod: { type: "scheme"; storedPaymentMethodId: string };
  shopperStatement?: string;
  metadata?: Record<string, string>;
  additionalData?: Record<string, string>;
  splits?: AdyenSplit[];
}

export interface AdyenAction {
  type: "redirect" | "threeDS2" | "await";
  url?: string;
  paymentData?: string;
}

export interface AdyenPaymentResponse {
  pspReference?: string;
  resultCode: AdyenResultCode;
  amount?: AdyenAmount;
  action?: AdyenAction;
  refusalReason?: string;
  refusalReasonCode?: string;
  additionalData?: Record<string, string>;
}

export interface AdyenModificationRequest {
  merchantAccount: string;
  reference: string;
  amount?: AdyenAmount;
}

export interface AdyenModificationResponse {
  pspReference: string;
  paymentPspReference: string;
  status: "received";
  amount?: AdyenAmount;
}

export interface AdyenTerminalAssignment {
  terminalId: string;
  storeId?: string;
  merchantAccount: string;
  status: "Assigned" | "AssignmentScheduled";
}

export interface AdyenApi {
  payments(request: AdyenPaymentRequest, options: AdyenRequestOptions): Promise<AdyenResponse<AdyenPaymentResponse>>;
  captures(
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenModificationResponse>>;
  refunds(
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenModificationResponse>>;
  cancels(
    pspReference: string,
    request: AdyenModificationRequest,
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenModificationResponse>>;
  assignTerminal(
    request: { registrationCode: string; storeId?: string; merchantAccount: string },
    options: AdyenRequestOptions,
  ): Promise<AdyenResponse<AdyenTerminalAssignment>>;
}
