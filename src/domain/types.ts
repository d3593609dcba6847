export const PROVIDER_NAMES = ["stripe", "adyen"] as const;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

export type AttemptStatus =
  | "initiated"
  | "requires_action"
  | "pending"
  | "authorized"
  | "captured"
  | "voided"
  | "refunded"
  | "failed"
  | "disputed";

export type NextActionType = "redirect_to_url" | "challenge_shopper" | "use_sdk";

export interface NextAction {
  type: NextActionType;
  redirect_url: string | null;
  data: Record<string, string>;
}

export type SplitType = "sub_merchant" | "commission" | "fee" | "tax";

export interface SplitAllocation {
  account: string;
  amount: number;
  type: SplitType;
  reference: string | null;
}

export interface AttemptEvent {
  at: string;
  type: string;
  provider_reference: string | null;
  external_event_id: string | null;
  payload: string | null;
}

export interface PaymentAttemptRecord {
  key: string;
  org_id: string;
  provider: ProviderName;
  payment_intent_id: string;
  status: AttemptStatus;
  currency: string;
  requested_amount: number;
  authorized_amount: number;
  captured_amount: number;
  refunded_amount: number;
  capture_automatically: boolean;
  payment_method_token: string | null;
  statement_descriptor: string | null;
  metadata: Record<string, string>;
  provider_reference: string | null;
  authorization_code: string | null;
  network_transaction_id: string | null;
  next_action: NextAction | null;
  connected_account_id: string | null;
  application_fee: number | null;
  splits: SplitAllocation[];
  retry_count: number;
  retry_generation: number;
  refund_sequence: number;
  next_retry_at: string | null;
  last_attempt_at: string | null;
  last_error_code: string | null;
  last_error_message: string | null;
  idempotency_keys: Record<string, string>;
  events: AttemptEvent[];
  created_at: string;
  authorized_at: string | null;
  captured_at: string | null;
  canceled_at: string | null;
  updated_at: string;
  version: number;
}

export interface AuthorizeRequest {
  amount: number;
  currency: string;
  paymentMethodToken: string;
  autoCapture: boolean;
  statementDescriptor?: string;
  metadata?: Record<string, string>;
}

export interface OperationResult {
  success: boolean;
  transaction_id: string | null;
  code: string | null;
  message: string | null;
}

export interface AuthorizeResult extends OperationResult {
  status: AttemptStatus;
  authorization_code: string | null;
  network_transaction_id: string | null;
  next_action: NextAction | null;
}

export interface CaptureResult extends OperationResult {
  status: AttemptStatus;
  capture_id: string | null;
  captured_amount: number;
}

export interface RefundResult extends OperationResult {
  status: AttemptStatus;
  refund_id: string | null;
  refunded_amount: number;
}

export interface VoidResult extends OperationResult {
  status: AttemptStatus;
  void_id: string | null;
}

export interface SetupIntentResult extends OperationResult {
  setup_intent_id: string | null;
  client_secret: string | null;
}

export interface TerminalPairingResult extends OperationResult {
  reader_id: string | null;
  reader_status: string | null;
}

export interface ConnectionTokenResult extends OperationResult {
  secret: string | null;
}

export interface WebhookHandlingResult {
  applied: boolean;
  transition: string | null;
  status: AttemptStatus;
  version: number;
}

export interface AttemptStateView {
  processor: ProviderName;
  org_id: string;
  payment_intent_id: string;
  transaction_id: string | null;
  authorization_code: string | null;
  status: AttemptStatus;
  currency: string;
  requested_amount: number;
  authorized_amount: number;
  captured_amount: number;
  refunded_amount: number;
  amount_refundable: number;
  splits: SplitAllocation[];
  retry_count: number;
  next_retry_at: string | null;
  last_attempt_at: string | null;
  last_error_code: string | null;
  last_error_message: string | null;
  next_action: NextAction | null;
  version: number;
  events: AttemptEvent[];
}
