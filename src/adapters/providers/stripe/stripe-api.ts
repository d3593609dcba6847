/**
 * Card-network A wire vocabulary: lowercase currencies, integer minor-unit
 * amounts, snake_case fields. Only the fields the client reads are modelled.
 */
export type StripePaymentIntentStatus =
  | "requires_payment_method"
  | "requires_confirmation"
  | "requires_action"
  | "processing"
  | "requires_capture"
  | "canceled"
  | "succeeded";

export interface StripeRequestOptions {
  idempotencyKey: string;
  signal: AbortSignal;
}

export type StripeErrorType =
  | "card_error"
  | "api_error"
  | "api_connection_error"
  | "rate_limit_error"
  | "invalid_request_error"
  | "idempotency_error";

export interface StripeError {
  type: StripeErrorType;
  code?: string;
  decline_code?: string;
  message: string;
  payment_intent_id?: string;
}

export type StripeResponse<TBody> = { ok: true; body: TBody } | { ok: false; status: number; error: StripeError };

export type StripeNextAction =
  | { type: "redirect_to_url"; redirect_to_url: { url: string; return_url: string | null } }
  | { type: "use_stripe_sdk"; use_stripe_sdk: Record<string, string> };

export interface StripePaymentIntent {
  id: string;
  object: "payment_intent";
  status: StripePaymentIntentStatus;
  amount: number;
  amount_capturable: number;
  amount_received: number;
  currency: string;
  latest_charge: string | null;
  client_secret: string | null;
  next_action: StripeNextAction | null;
  last_payment_error: { code?: string; decline_code?: string; message: string } | null;
}

export interface StripePaymentIntentCreateParams {
  amount: number;
  currency: string;
  payment_method: string;
  confirm: true;
  capture_method: "automatic" | "manual";
  statement_descriptor?: string;
  metadata?: Record<string, string>;
  on_behalf_of?: string;
  transfer_data?: { destination: string };
  application_fee_amount?: number;
}

export interface StripeRefund {
  id: string;
  object: "refund";
  amount: number;
  status: "succeeded" | "pending" | "failed" | "canceled";
  payment_intent: string;
}

export interface StripeSetupIntent {
  id: string;
  object: "setup_intent";
  client_secret: string | null;
  status: string;
}

export interface StripeTerminalReader {
  id: string;
  object: "terminal.reader";
  label: string;
  status: "online" | "offline";
  device_type: string;
  serial_number: string;
}

export interface StripeConnectionToken {
  object: "terminal.connection_token";
  secret: string;
}

export type StripeCancellationReason = "duplicate" | "fraudulent" | "requested_by_customer" | "abandoned";
export type StripeRefundReason = "duplicate" | "fraudulent" | "requested_by_customer";

export interface StripeApi {
  createPaymentIntent(
    params: StripePaymentIntentCreateParams,
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>>;
  capturePaymentIntent(
    id: string,
    params: { amount_to_capture: number },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>>;
  cancelPaymentIntent(
    id: string,
    params: { cancellation_reason?: StripeCancellationReason },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripePaymentIntent>>;
  createRefund(
    params: { payment_intent: string; amount: number; reason?: StripeRefundReason },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeRefund>>;
  createSetupIntent(
    params: { customer: string; usage: "off_session" },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeSetupIntent>>;
  createTerminalReader(
    params: { registration_code: string; label: string; location?: string },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeTerminalReader>>;
  createConnectionToken(
    params: { location?: string },
    options: StripeRequestOptions,
  ): Promise<StripeResponse<StripeConnectionToken>>;
}
