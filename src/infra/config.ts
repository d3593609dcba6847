import { AppError } from "./app-error.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export const DEFAULT_API_KEY = "dev_ppc_key";
export const DEFAULT_STRIPE_WEBHOOK_SECRET = "dev_stripe_webhook_secret";
// base64 of "dev_adyen_hmac_key_0123456789abcdef"
export const DEFAULT_ADYEN_HMAC_KEY = "ZGV2X2FkeWVuX2htYWNfa2V5XzAxMjM0NTY3ODlhYmNkZWY=";

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  logLevel: LogLevel;
  attemptBackend: "memory" | "postgres";
  circuitBackend: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  redisCircuitPrefix: string;
  circuitFailureThreshold: number;
  circuitCooldownSeconds: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  providerTimeoutMs: number;
  stripeWebhookSecret: string;
  adyenHmacKey: string;
  adyenMerchantAccount: string;
  metricsEnabled: boolean;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("PPC_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("PPC_API_KEY", DEFAULT_API_KEY, 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const logLevel = parseEnumEnv("PPC_LOG_LEVEL", LOG_LEVELS, "info");
  const attemptBackend = parseEnumEnv("PPC_ATTEMPT_BACKEND", ["memory", "postgres"] as const, "memory");
  const circuitBackend = parseEnumEnv("PPC_CIRCUIT_BACKEND", ["memory", "redis"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("PPC_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("PPC_REDIS_URL", 8);
  const redisCircuitPrefix = parseStringEnv("PPC_REDIS_CIRCUIT_PREFIX", "ppc:circuit", 3);
  const circuitFailureThreshold = parseIntegerEnv("PPC_CIRCUIT_FAILURE_THRESHOLD", 3, 1, 50);
  const circuitCooldownSeconds = parseIntegerEnv("PPC_CIRCUIT_COOLDOWN_SECONDS", 30, 1, 3600);
  const retryMaxAttempts = parseIntegerEnv("PPC_RETRY_MAX_ATTEMPTS", 5, 1, 20);
  const retryBaseDelayMs = parseIntegerEnv("PPC_RETRY_BASE_DELAY_MS", 1000, 10, 60_000);
  const retryMaxDelayMs = parseIntegerEnv("PPC_RETRY_MAX_DELAY_MS", 16_000, 10, 3_600_000);
  const providerTimeoutMs = parseIntegerEnv("PPC_PROVIDER_TIMEOUT_MS", 10_000, 10, 120_000);
  const stripeWebhookSecret = parseStringEnv("PPC_STRIPE_WEBHOOK_SECRET", DEFAULT_STRIPE_WEBHOOK_SECRET, 8);
  const adyenHmacKey = parseStringEnv("PPC_ADYEN_HMAC_KEY", DEFAULT_ADYEN_HMAC_KEY, 16);
  const adyenMerchantAccount = parseStringEnv("PPC_ADYEN_MERCHANT_ACCOUNT", "SandboxMerchantAccount", 3);
  const metricsEnabled = parseBooleanEnv("PPC_METRICS_ENABLED", true);

  if (process.env.NODE_ENV === "production") {
    if (apiKeys.includes(DEFAULT_API_KEY)) {
      throw invalidConfig(
        configuredApiKeys ? "PPC_API_KEYS" : "PPC_API_KEY",
        "must not include default key value in production",
      );
    }
    if (stripeWebhookSecret === DEFAULT_STRIPE_WEBHOOK_SECRET) {
      throw invalidConfig("PPC_STRIPE_WEBHOOK_SECRET", "must not use default value in production");
    }
    if (adyenHmacKey === DEFAULT_ADYEN_HMAC_KEY) {
      throw invalidConfig("PPC_ADYEN_HMAC_KEY", "must not use default value in production");
    }
  }
  if (retryBaseDelayMs > retryMaxDelayMs) {
    throw invalidConfig("PPC_RETRY_BASE_DELAY_MS", "must be lower or equal to PPC_RETRY_MAX_DELAY_MS");
  }
  if (attemptBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("PPC_POSTGRES_URL", "is required when PPC_ATTEMPT_BACKEND=postgres");
  }
  if (circuitBackend === "redis" && !redisUrl) {
    throw invalidConfig("PPC_REDIS_URL", "is required when PPC_CIRCUIT_BACKEND=redis");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    logLevel,
    attemptBackend,
    circuitBackend,
    redisCircuitPrefix,
    circuitFailureThreshold,
    circuitCooldownSeconds,
    retryMaxAttempts,
    retryBaseDelayMs,
    retryMaxDelayMs,
    providerTimeoutMs,
    stripeWebhookSecret,
    adyenHmacKey,
    adyenMerchantAccount,
    metricsEnabled,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
