import type { NextAction, ProviderName, SplitAllocation } from "../domain/types.js";

/**
 * Every outbound call carries the idempotency key the network uses to deduplicate
 * physical retries, and a signal that aborts the call on timeout.
 */
export interface ProviderCallOptions {
  idempotencyKey: string;
  signal: AbortSignal;
}

export interface CreatePaymentInput {
  amount: number;
  currency: string;
  paymentMethodToken: string;
  autoCapture: boolean;
  reference: string;
  statementDescriptor?: string;
  metadata?: Record<string, string>;
  connectedAccountId?: string;
  applicationFee?: number;
}

export interface CaptureInput {
  reference: string;
  amount: number;
  currency: string;
}

export interface RefundInput {
  reference: string;
  amount: number;
  currency: string;
  reason?: string;
}

export interface CancelInput {
  reference: string;
  reason?: string;
}

export interface PairTerminalInput {
  registrationCode: string;
  label: string;
  locationId?: string;
  merchantAccount?: string;
}

interface DeclineFields {
  success: false;
  reference: string | null;
  errorCode: string;
  errorMessage: string;
  providerCode: string | null;
}

export type DeclinedOutcome = DeclineFields & { status: "declined" };
export type FailedOutcome = DeclineFields & { status: "failed" };

export type PaymentOutcome =
  | { success: false; status: "requires_action"; reference: string; amount: number; nextAction: NextAction }
  | { success: true; status: "pending"; reference: string; amount: number }
  | {
      success: true;
      status: "authorized" | "captured";
      reference: string;
      amount: number;
      authCode: string | null;
      networkTransactionId: string | null;
    }
  | DeclinedOutcome
  | FailedOutcome;

export type CaptureOutcome =
  | { success: true; status: "captured"; reference: string; amount: number }
  | DeclinedOutcome
  | FailedOutcome;

export type RefundOutcome =
  | { success: true; status: "refunded" | "pending"; reference: string; amount: number }
  | DeclinedOutcome
  | FailedOutcome;

export type CancelOutcome =
  | { success: true; status: "canceled"; reference: string }
  | DeclinedOutcome
  | FailedOutcome;

export type SetupIntentOutcome =
  | { success: true; status: "created"; reference: string; clientSecret: string | null }
  | FailedOutcome;

export type TerminalPairingOutcome =
  | { success: true; status: "paired"; reference: string; readerStatus: string }
  | FailedOutcome;

export type ConnectionTokenOutcome =
  | { success: true; status: "issued"; secret: string }
  | FailedOutcome;

export type WebhookTransition =
  | "authorization_completed"
  | "payment_failed"
  | "capture_completed"
  | "canceled"
  | "refund_notice"
  | "refund_failed"
  | "chargeback";

/** Identity the merchant attached before the call, echoed back by the network. */
export interface WebhookAttemptHint {
  paymentIntentId: string;
  orgId: string | null;
}

export interface InboundWebhookEvent {
  eventType: string;
  providerReference: string;
  externalEventId: string | null;
  attemptHint: WebhookAttemptHint | null;
  rawPayload: string;
}

/**
 * Normalized contract every card network implements. Provider vocabulary and
 * money formats stop here; callers only ever see the outcome unions above.
 */
export interface ProviderClientPort {
  readonly name: ProviderName;
  createPayment(input: CreatePaymentInput, options: ProviderCallOptions): Promise<PaymentOutcome>;
  createSplitPayment(
    input: CreatePaymentInput,
    splits: SplitAllocation[],
    options: ProviderCallOptions,
  ): Promise<PaymentOutcome>;
  capture(input: CaptureInput, options: ProviderCallOptions): Promise<CaptureOutcome>;
  refund(input: RefundInput, options: ProviderCallOptions): Promise<RefundOutcome>;
  cancel(input: CancelInput, options: ProviderCallOptions): Promise<CancelOutcome>;
  createSetupIntent(customerId: string, options: ProviderCallOptions): Promise<SetupIntentOutcome>;
  pairTerminal(input: PairTerminalInput, options: ProviderCallOptions): Promise<TerminalPairingOutcome>;
  createConnectionToken(
    locationId: string | undefined,
    options: ProviderCallOptions,
  ): Promise<ConnectionTokenOutcome>;
  verifyWebhookSignature(rawPayload: string, signature: string, secret: string): boolean;
  parseWebhook(rawPayload: string): InboundWebhookEvent[];
  translateWebhookEvent(eventType: string, rawPayload: string): WebhookTransition | null;
}

export type ProviderClientSet = Record<ProviderName, ProviderClientPort>;
