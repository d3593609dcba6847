import Fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { randomUUID } from "node:crypto";
import { Pool } from "pg";
import type { Logger } from "pino";
import { AdyenProviderClient } from "./adapters/providers/adyen/adyen-client.js";
import type { AdyenApi } from "./adapters/providers/adyen/adyen-api.js";
import { SandboxAdyenApi } from "./adapters/providers/adyen/sandbox-adyen-api.js";
import { SandboxStripeApi } from "./adapters/providers/stripe/sandbox-stripe-api.js";
import type { StripeApi } from "./adapters/providers/stripe/stripe-api.js";
import { StripeProviderClient } from "./adapters/providers/stripe/stripe-client.js";
import { InMemoryAttemptStore } from "./adapters/inmemory/attempt-store.js";
import { InMemoryPaymentIntentNotifier } from "./adapters/inmemory/payment-intent-notifier.js";
import { PostgresAttemptStore } from "./adapters/postgres/attempt-store.js";
import { RedisCircuitBreaker } from "./adapters/redis/circuit-breaker.js";
import {
  assertAuthorizeInput,
  assertCaptureInput,
  assertConnectedAuthorizeInput,
  assertConnectionTokenInput,
  assertPairTerminalInput,
  assertRefundInput,
  assertSetupIntentInput,
  assertSplitAuthorizeInput,
  assertVoidInput,
  normalizeProvider,
  normalizeResourceId,
  toSplitAllocations,
  type AuthorizeBody,
} from "./api/validators.js";
import { ProcessorActorDirectory } from "./application/processor-actor-directory.js";
import { RetryPolicy } from "./application/retry-policy.js";
import { TerminalService } from "./application/terminal-service.js";
import { WebhookReconciler, needsRedelivery } from "./application/webhook-reconciler.js";
import { circuitKeyFor, type AttemptIdentity } from "./domain/attempt-key.js";
import type { AuthorizeRequest, ProviderName } from "./domain/types.js";
import { AppError } from "./infra/app-error.js";
import { InMemoryCircuitBreaker } from "./infra/circuit-breaker.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";
import { ProcessorMetricsRegistry } from "./infra/metrics.js";
import type { AttemptStorePort } from "./ports/attempt-store.js";
import type { CircuitBreakerPort } from "./ports/circuit-breaker.js";
import type { PaymentIntentNotifierPort } from "./ports/payment-intent-notifier.js";
import type { ProviderClientSet } from "./ports/provider-client.js";

export interface BuildAppOptions {
  config?: RuntimeConfig;
  logger?: Logger;
  clock?: ClockPort;
  stripeApi?: StripeApi;
  adyenApi?: AdyenApi;
  notifier?: PaymentIntentNotifierPort;
}

interface ProcessorParams {
  orgId: string;
  provider: string;
}

interface PaymentParams extends ProcessorParams {
  paymentIntentId: string;
}

const SIGNATURE_HEADERS: Record<ProviderName, string> = {
  stripe: "stripe-signature",
  adyen: "x-adyen-hmac-signature",
};
const IDLE_SWEEP_INTERVAL_MS = 60_000;

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

function toAuthorizeRequest(body: AuthorizeBody): AuthorizeRequest {
  return {
    amount: body.amount,
    currency: body.currency,
    paymentMethodToken: body.payment_method_token,
    autoCapture: body.auto_capture ?? false,
    ...(body.statement_descriptor ? { statementDescriptor: body.statement_descriptor } : {}),
    ...(body.metadata ? { metadata: body.metadata } : {}),
  };
}

function processorScope(params: ProcessorParams): { orgId: string; provider: ProviderName } {
  return {
    orgId: normalizeResourceId(params.orgId, "org_id"),
    provider: normalizeProvider(params.provider),
  };
}

function paymentIdentity(params: PaymentParams): AttemptIdentity {
  return {
    ...processorScope(params),
    paymentIntentId: normalizeResourceId(params.paymentIntentId, "payment_intent_id"),
  };
}

function requireProvider(identity: AttemptIdentity, provider: ProviderName, operation: string): void {
  if (identity.provider !== provider) {
    throw new AppError(422, "unsupported_operation", `${operation} is only available on '${provider}'.`);
  }
}

export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const config = options.config ?? loadRuntimeConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const clock = options.clock ?? new SystemClock();
  const app = Fastify({ logger: false });
  const metrics = new ProcessorMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const closeActions: Array<() => Promise<void>> = [];
  const readinessChecks: Array<() => Promise<void>> = [];
  const requestStarts = new WeakMap<FastifyRequest, bigint>();

  const postgresPool =
    config.attemptBackend === "postgres" && config.postgresUrl
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
    readinessChecks.push(async () => {
      await postgresPool.query("SELECT 1");
    });
  }

  const redisClient =
    config.circuitBackend === "redis" && config.redisUrl
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
    readinessChecks.push(async () => {
      await redisClient.ping();
    });
  }

  let store: AttemptStorePort;
  if (config.attemptBackend === "postgres") {
    if (!postgresPool) {
      throw new AppError(500, "invalid_runtime_config", "Postgres attempt store requested without PostgreSQL.");
    }
    store = new PostgresAttemptStore(postgresPool);
  } else {
    store = new InMemoryAttemptStore();
  }

  const circuitPolicy = {
    failureThreshold: config.circuitFailureThreshold,
    cooldownSeconds: config.circuitCooldownSeconds,
  };
  let circuitBreaker: CircuitBreakerPort;
  if (config.circuitBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis circuit breaker requested without Redis client.");
    }
    circuitBreaker = new RedisCircuitBreaker(redisClient, {
      keyPrefix: config.redisCircuitPrefix,
      policy: circuitPolicy,
    });
  } else {
    circuitBreaker = new InMemoryCircuitBreaker({ policy: circuitPolicy, clock });
  }

  const clients: ProviderClientSet = {
    stripe: new StripeProviderClient(options.stripeApi ?? new SandboxStripeApi()),
    adyen: new AdyenProviderClient(options.adyenApi ?? new SandboxAdyenApi(), {
      merchantAccount: config.adyenMerchantAccount,
    }),
  };
  const retryPolicy = new RetryPolicy(
    {
      maxAttempts: config.retryMaxAttempts,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
    { clock },
  );
  const shared = {
    circuitBreaker,
    logger,
    providerTimeoutMs: config.providerTimeoutMs,
    ...(config.metricsEnabled ? { metrics } : {}),
  };

  const directory = new ProcessorActorDirectory({
    ...shared,
    store,
    clients,
    retryPolicy,
    notifier: options.notifier ?? new InMemoryPaymentIntentNotifier(),
    clock,
  });
  const terminals = new TerminalService({ ...shared, clients });
  const reconciler = new WebhookReconciler({
    directory,
    store,
    clients,
    secrets: { stripe: config.stripeWebhookSecret, adyen: config.adyenHmacKey },
    logger,
    ...(config.metricsEnabled ? { metrics } : {}),
  });

  const idleSweep = setInterval(() => {
    const dropped = directory.deactivateIdle();
    if (dropped > 0) {
      logger.debug({ dropped }, "idle processor actors deactivated");
    }
  }, IDLE_SWEEP_INTERVAL_MS);
  idleSweep.unref();
  closeActions.push(async () => {
    clearInterval(idleSweep);
  });

  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, requestId: request.id, url: request.url }, "unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_error",
        message: "Unexpected internal error.",
        request_id: request.id,
      },
    });
  });

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    try {
      for (const check of readinessChecks) {
        await check();
      }
    } catch (error) {
      logger.warn({ err: error }, "readiness check failed");
      return reply.status(503).send({ status: "unavailable" });
    }
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStarts.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/health/") || request.url.startsWith("/v1/webhooks/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    const startNs = requestStarts.get(request);
    if (!config.metricsEnabled || startNs === undefined) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post<{ Params: ProcessorParams }>("/v1/orgs/:orgId/processors/:provider/payments", async (request, reply) => {
    const { orgId, provider } = processorScope(request.params);
    assertAuthorizeInput(request.body);
    const paymentIntentId = request.body.payment_intent_id ?? `pi_${randomUUID().replace(/-/g, "")}`;
    const actor = directory.resolve({ orgId, provider, paymentIntentId });
    const result = await actor.authorize(toAuthorizeRequest(request.body));
    return reply.status(200).send({ payment_intent_id: paymentIntentId, ...result });
  });

  app.post<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId/connected-authorize",
    async (request, reply) => {
      const identity = paymentIdentity(request.params);
      requireProvider(identity, "stripe", "Connected-account authorization");
      assertConnectedAuthorizeInput(request.body);
      const result = await directory
        .stripe(identity.orgId, identity.paymentIntentId)
        .authorizeOnBehalfOf(toAuthorizeRequest(request.body), request.body.connected_account_id, request.body.application_fee);
      return reply.status(200).send({ payment_intent_id: identity.paymentIntentId, ...result });
    },
  );

  app.post<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId/split-authorize",
    async (request, reply) => {
      const identity = paymentIdentity(request.params);
      requireProvider(identity, "adyen", "Split authorization");
      assertSplitAuthorizeInput(request.body);
      const result = await directory
        .adyen(identity.orgId, identity.paymentIntentId)
        .authorizeWithSplit(toAuthorizeRequest(request.body), toSplitAllocations(request.body.splits));
      return reply.status(200).send({ payment_intent_id: identity.paymentIntentId, ...result });
    },
  );

  app.post<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId/setup-intent",
    async (request, reply) => {
      const identity = paymentIdentity(request.params);
      requireProvider(identity, "stripe", "Setup intents");
      assertSetupIntentInput(request.body);
      const result = await directory
        .stripe(identity.orgId, identity.paymentIntentId)
        .createSetupIntent(request.body.customer_id);
      return reply.status(200).send(result);
    },
  );

  app.post<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId/capture",
    async (request, reply) => {
      const identity = paymentIdentity(request.params);
      assertCaptureInput(request.body);
      const result = await directory.resolve(identity).capture(request.body.transaction_id, request.body.amount);
      return reply.status(200).send(result);
    },
  );

  app.post<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId/refund",
    async (request, reply) => {
      const identity = paymentIdentity(request.params);
      assertRefundInput(request.body);
      const result = await directory
        .resolve(identity)
        .refund(request.body.transaction_id, request.body.amount, request.body.reason);
      return reply.status(200).send(result);
    },
  );

  app.post<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId/void",
    async (request, reply) => {
      const identity = paymentIdentity(request.params);
      assertVoidInput(request.body);
      const result = await directory.resolve(identity).void(request.body.transaction_id, request.body.reason);
      return reply.status(200).send(result);
    },
  );

  app.get<{ Params: PaymentParams }>(
    "/v1/orgs/:orgId/processors/:provider/payments/:paymentIntentId",
    async (request, reply) => {
      const state = await directory.resolve(paymentIdentity(request.params)).getState();
      return reply.status(200).send(state);
    },
  );

  app.post<{ Params: ProcessorParams }>("/v1/orgs/:orgId/processors/:provider/terminals/pair", async (request, reply) => {
    const { orgId, provider } = processorScope(request.params);
    assertPairTerminalInput(request.body);
    const body = request.body;
    const result = await terminals.pairTerminal(orgId, provider, {
      registrationCode: body.registration_code,
      label: body.label,
      ...(body.location_id ? { locationId: body.location_id } : {}),
      ...(body.merchant_account ? { merchantAccount: body.merchant_account } : {}),
    });
    return reply.status(200).send(result);
  });

  app.post<{ Params: ProcessorParams }>(
    "/v1/orgs/:orgId/processors/:provider/terminals/connection-token",
    async (request, reply) => {
      const { orgId, provider } = processorScope(request.params);
      const body = request.body ?? {};
      assertConnectionTokenInput(body);
      const result = await terminals.createConnectionToken(orgId, provider, body.location_id);
      return reply.status(200).send(result);
    },
  );

  app.get<{ Params: ProcessorParams }>("/v1/orgs/:orgId/processors/:provider/circuit", async (request, reply) => {
    const { orgId, provider } = processorScope(request.params);
    const key = circuitKeyFor(provider, orgId);
    const snapshot = await circuitBreaker.getState(key);
    return reply.status(200).send({ key, ...snapshot });
  });

  app.post<{ Params: ProcessorParams }>(
    "/v1/orgs/:orgId/processors/:provider/circuit/reset",
    async (request, reply) => {
      const { orgId, provider } = processorScope(request.params);
      const key = circuitKeyFor(provider, orgId);
      await circuitBreaker.reset(key);
      logger.info({ circuit: key }, "circuit reset");
      const snapshot = await circuitBreaker.getState(key);
      return reply.status(200).send({ key, ...snapshot });
    },
  );

  // Signatures are computed over the exact bytes received, so this scope keeps the body raw.
  void app.register(async (webhooks) => {
    webhooks.addContentTypeParser("application/json", { parseAs: "string" }, (_request, body, done) => {
      done(null, body);
    });

    webhooks.post<{ Params: { provider: string } }>("/v1/webhooks/processors/:provider", async (request, reply) => {
      const provider = normalizeProvider(request.params.provider);
      const header = request.headers[SIGNATURE_HEADERS[provider]];
      const results = await reconciler.reconcile({
        provider,
        rawBody: typeof request.body === "string" ? request.body : "",
        signature: typeof header === "string" ? header : undefined,
      });
      // A non-2xx answer makes the network redeliver the whole delivery later.
      if (needsRedelivery(results)) {
        logger.warn({ provider, results }, "webhook delivery left unreconciled items, asking for redelivery");
        return reply.status(503).send({ received: false, results });
      }
      if (provider === "adyen") {
        return reply.status(200).type("text/plain; charset=utf-8").send("[accepted]");
      }
      return reply.status(200).send({ received: true, results });
    });
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
