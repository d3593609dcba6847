import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AppError } from "../src/infra/app-error.js";
import { DEFAULT_ADYEN_HMAC_KEY, loadRuntimeConfig } from "../src/infra/config.js";

const originalEnv = { ...process.env };

function clearConfigEnv(): void {
  for (const name of Object.keys(process.env)) {
    if (name.startsWith("PPC_") || name === "HOST" || name === "PORT" || name === "NODE_ENV") {
      delete process.env[name];
    }
  }
}

beforeEach(() => {
  clearConfigEnv();
});

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("Runtime config", () => {
  it("loads defaults", () => {
    const config = loadRuntimeConfig();

    expect(config).toEqual({
      host: "0.0.0.0",
      port: 8080,
      apiKey: "dev_ppc_key",
      apiKeys: ["dev_ppc_key"],
      logLevel: "info",
      attemptBackend: "memory",
      circuitBackend: "memory",
      redisCircuitPrefix: "ppc:circuit",
      circuitFailureThreshold: 3,
      circuitCooldownSeconds: 30,
      retryMaxAttempts: 5,
      retryBaseDelayMs: 1000,
      retryMaxDelayMs: 16_000,
      providerTimeoutMs: 10_000,
      stripeWebhookSecret: "dev_stripe_webhook_secret",
      adyenHmacKey: DEFAULT_ADYEN_HMAC_KEY,
      adyenMerchantAccount: "SandboxMerchantAccount",
      metricsEnabled: true,
    });
  });

  it("accepts several API keys for rotation", () => {
    process.env.PPC_API_KEYS = "new_key_12345678, old_key_12345678,new_key_12345678";

    const config = loadRuntimeConfig();

    expect(config.apiKeys).toEqual(["new_key_12345678", "old_key_12345678"]);
    expect(config.apiKey).toBe("new_key_12345678");
  });

  it("reads backends and tuning", () => {
    process.env.PPC_ATTEMPT_BACKEND = "postgres";
    process.env.PPC_POSTGRES_URL = "postgres://localhost:5432/ppc";
    process.env.PPC_CIRCUIT_BACKEND = "redis";
    process.env.PPC_REDIS_URL = "redis://localhost:6379";
    process.env.PPC_CIRCUIT_FAILURE_THRESHOLD = "5";
    process.env.PPC_METRICS_ENABLED = "0";

    const config = loadRuntimeConfig();

    expect(config.attemptBackend).toBe("postgres");
    expect(config.postgresUrl).toBe("postgres://localhost:5432/ppc");
    expect(config.redisUrl).toBe("redis://localhost:6379");
    expect(config.circuitFailureThreshold).toBe(5);
    expect(config.metricsEnabled).toBe(false);
  });

  it("refuses default secrets in production", () => {
    process.env.NODE_ENV = "production";

    expect(() => loadRuntimeConfig()).toThrowError(
      new AppError(500, "invalid_runtime_config", "Environment variable 'PPC_API_KEY' must not include default key value in production."),
    );
  });

  it("rejects malformed values", () => {
    process.env.PORT = "eighty";
    expect(() => loadRuntimeConfig()).toThrow("Environment variable 'PORT' must be an integer.");

    delete process.env.PORT;
    process.env.PPC_CIRCUIT_BACKEND = "etcd";
    expect(() => loadRuntimeConfig()).toThrow("Environment variable 'PPC_CIRCUIT_BACKEND' must be one of: memory, redis.");

    delete process.env.PPC_CIRCUIT_BACKEND;
    process.env.PPC_RETRY_BASE_DELAY_MS = "20000";
    expect(() => loadRuntimeConfig()).toThrow(
      "Environment variable 'PPC_RETRY_BASE_DELAY_MS' must be lower or equal to PPC_RETRY_MAX_DELAY_MS.",
    );
  });

  it("requires a connection string for external backends", () => {
    process.env.PPC_ATTEMPT_BACKEND = "postgres";

    expect(() => loadRuntimeConfig()).toThrow(
      "Environment variable 'PPC_POSTGRES_URL' is required when PPC_ATTEMPT_BACKEND=postgres.",
    );
  });
});
