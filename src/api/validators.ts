import { isProviderName } from "../domain/attempt-key.js";
import type { ProviderName, SplitAllocation, SplitType } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

const RESOURCE_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const SPLIT_TYPES: readonly SplitType[] = ["sub_merchant", "commission", "fee", "tax"];

export interface AuthorizeBody {
  payment_intent_id?: string;
  amount: number;
  currency: string;
  payment_method_token: string;
  auto_capture?: boolean;
  statement_descriptor?: string;
  metadata?: Record<string, string>;
}

export interface ConnectedAuthorizeBody extends AuthorizeBody {
  connected_account_id: string;
  application_fee?: number;
}

export interface SplitAuthorizeBody extends AuthorizeBody {
  splits: SplitAllocation[];
}

export interface CaptureBody {
  transaction_id: string;
  amount?: number;
}

export interface RefundBody {
  transaction_id: string;
  amount: number;
  reason?: string;
}

export interface VoidBody {
  transaction_id: string;
  reason?: string;
}

export interface PairTerminalBody {
  registration_code: string;
  label: string;
  location_id?: string;
  merchant_account?: string;
}

function requireObject(payload: unknown): Record<string, unknown> {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  return payload;
}

function assertOptionalString(payload: Record<string, unknown>, field: string): void {
  if (payload[field] !== undefined && !isString(payload[field])) {
    throw new AppError(422, `invalid_${field}`, `${field} must be a non-empty string.`);
  }
}

function assertTransactionId(payload: Record<string, unknown>): void {
  if (!isString(payload.transaction_id)) {
    throw new AppError(422, "invalid_transaction_id", "transaction_id is required.");
  }
}

export function normalizeProvider(value: string): ProviderName {
  if (!isProviderName(value)) {
    throw new AppError(404, "unknown_provider", `Provider '${value}' is not supported.`);
  }
  return value;
}

export function normalizeResourceId(value: string, field: string): string {
  if (!RESOURCE_ID_PATTERN.test(value)) {
    throw new AppError(422, `invalid_${field}`, `${field} must match ${RESOURCE_ID_PATTERN.source}.`);
  }
  return value;
}

export function assertAuthorizeInput(payload: unknown): asserts payload is AuthorizeBody {
  const body = requireObject(payload);
  if (!isPositiveInteger(body.amount)) {
    throw new AppError(422, "invalid_amount", "Amount must be an integer greater than zero.");
  }
  if (!isString(body.currency) || !/^[A-Za-z]{3}$/.test(body.currency)) {
    throw new AppError(422, "invalid_currency", "Currency must be a 3-letter ISO code.");
  }
  if (!isString(body.payment_method_token)) {
    throw new AppError(422, "invalid_payment_method_token", "payment_method_token is required.");
  }
  if (body.auto_capture !== undefined && typeof body.auto_capture !== "boolean") {
    throw new AppError(422, "invalid_auto_capture", "auto_capture must be a boolean.");
  }
  if (body.payment_intent_id !== undefined) {
    if (!isString(body.payment_intent_id)) {
      throw new AppError(422, "invalid_payment_intent_id", "payment_intent_id must be a non-empty string.");
    }
    normalizeResourceId(body.payment_intent_id, "payment_intent_id");
  }
  assertOptionalString(body, "statement_descriptor");
  const metadata = body.metadata;
  if (metadata !== undefined && (!isObject(metadata) || !Object.values(metadata).every((value) => typeof value === "string"))) {
    throw new AppError(422, "invalid_metadata", "metadata must map strings to strings.");
  }
}

export function assertConnectedAuthorizeInput(payload: unknown): asserts payload is ConnectedAuthorizeBody {
  assertAuthorizeInput(payload);
  const body = requireObject(payload);
  if (!isString(body.connected_account_id)) {
    throw new AppError(422, "invalid_connected_account_id", "connected_account_id is required.");
  }
  if (body.application_fee !== undefined && (typeof body.application_fee !== "number" || !Number.isInteger(body.application_fee))) {
    throw new AppError(422, "invalid_application_fee", "application_fee must be an integer.");
  }
}

export function assertSplitAuthorizeInput(payload: unknown): asserts payload is SplitAuthorizeBody {
  assertAuthorizeInput(payload);
  const body = requireObject(payload);
  const splits = body.splits;
  if (!Array.isArray(splits) || splits.length === 0) {
    throw new AppError(422, "invalid_splits", "splits must be a non-empty array.");
  }
  for (const split of splits) {
    if (
      !isObject(split)
      || !isString(split.account)
      || typeof split.amount !== "number"
      || !SPLIT_TYPES.some((type) => type === split.type)
      || (split.reference !== null && split.reference !== undefined && !isString(split.reference))
    ) {
      throw new AppError(422, "invalid_splits", "Each split needs account, amount, type and an optional reference.");
    }
  }
}

export function toSplitAllocations(splits: SplitAllocation[]): SplitAllocation[] {
  return splits.map((split) => ({
    account: split.account,
    amount: split.amount,
    type: split.type,
    reference: split.reference ?? null,
  }));
}

export function assertCaptureInput(payload: unknown): asserts payload is CaptureBody {
  const body = requireObject(payload);
  assertTransactionId(body);
  if (body.amount !== undefined && typeof body.amount !== "number") {
    throw new AppError(422, "invalid_amount", "Capture amount must be a number.");
  }
}

export function assertRefundInput(payload: unknown): asserts payload is RefundBody {
  const body = requireObject(payload);
  assertTransactionId(body);
  if (typeof body.amount !== "number") {
    throw new AppError(422, "invalid_amount", "Refund amount is required.");
  }
  assertOptionalString(body, "reason");
}

export function assertVoidInput(payload: unknown): asserts payload is VoidBody {
  const body = requireObject(payload);
  assertTransactionId(body);
  assertOptionalString(body, "reason");
}

export function assertSetupIntentInput(payload: unknown): asserts payload is { customer_id: string } {
  const body = requireObject(payload);
  if (!isString(body.customer_id)) {
    throw new AppError(422, "invalid_customer_id", "customer_id is required.");
  }
}

export function assertPairTerminalInput(payload: unknown): asserts payload is PairTerminalBody {
  const body = requireObject(payload);
  if (!isString(body.registration_code)) {
    throw new AppError(422, "invalid_registration_code", "registration_code is required.");
  }
  if (!isString(body.label)) {
    throw new AppError(422, "invalid_label", "label is required.");
  }
  assertOptionalString(body, "location_id");
  assertOptionalString(body, "merchant_account");
}

export function assertConnectionTokenInput(payload: unknown): asserts payload is { location_id?: string } {
  assertOptionalString(requireObject(payload), "location_id");
}
