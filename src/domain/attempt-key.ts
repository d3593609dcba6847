import { AppError } from "../infra/app-error.js";
import { PROVIDER_NAMES, type ProviderName } from "./types.js";

export interface AttemptIdentity {
  orgId: string;
  provider: ProviderName;
  paymentIntentId: string;
}

export const MERCHANT_REFERENCE_PREFIX = "pi_ref_";

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

export function formatAttemptKey(identity: AttemptIdentity): string {
  return `${identity.orgId}:${identity.provider}:${identity.paymentIntentId}`;
}

export function parseAttemptKey(key: string): AttemptIdentity {
  const [orgId, provider, ...rest] = key.split(":");
  const paymentIntentId = rest.join(":");
  if (!orgId || !provider || !paymentIntentId || !isProviderName(provider)) {
    throw new AppError(400, "invalid_attempt_key", `Attempt key '${key}' is malformed.`);
  }
  return { orgId, provider, paymentIntentId };
}

export function circuitKeyFor(provider: ProviderName, orgId: string): string {
  return `${provider}:${orgId}`;
}
