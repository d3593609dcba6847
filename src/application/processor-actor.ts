import type { Logger } from "pino";
import { circuitKeyFor, formatAttemptKey, type AttemptIdentity } from "../domain/attempt-key.js";
import { canTransition, isTerminalStatus } from "../domain/state-machine.js";
import type {
  AttemptStateView,
  AttemptStatus,
  AuthorizeRequest,
  AuthorizeResult,
  CaptureResult,
  OperationResult,
  PaymentAttemptRecord,
  RefundResult,
  VoidResult,
  WebhookHandlingResult,
} from "../domain/types.js";
import { AppError, AttemptVersionConflictError } from "../infra/app-error.js";
import { SystemClock, type ClockPort } from "../infra/clock.js";
import type { ProcessorMetricsRegistry } from "../infra/metrics.js";
import type { AttemptStorePort } from "../ports/attempt-store.js";
import type { CircuitBreakerPort } from "../ports/circuit-breaker.js";
import type { PaymentIntentNotifierPort } from "../ports/payment-intent-notifier.js";
import type {
  CreatePaymentInput,
  FailedOutcome,
  DeclinedOutcome,
  PaymentOutcome,
  ProviderCallOptions,
  ProviderClientPort,
  WebhookTransition,
} from "../ports/provider-client.js";
import { ActorMailbox } from "./actor-mailbox.js";
import { IdempotencyKeyRegistry } from "./idempotency-keys.js";
import { invokeProvider, settleCircuit, type ProviderCallResult } from "./provider-call.js";
import { isRetryableError, type RetryPolicy } from "./retry-policy.js";

export interface ProcessorActorDependencies {
  store: AttemptStorePort;
  client: ProviderClientPort;
  circuitBreaker: CircuitBreakerPort;
  retryPolicy: RetryPolicy;
  notifier: PaymentIntentNotifierPort;
  logger: Logger;
  clock?: ClockPort;
  metrics?: ProcessorMetricsRegistry;
  providerTimeoutMs?: number;
  mintKey?: () => string;
}

export type Mutation = (draft: PaymentAttemptRecord) => void;

export interface AuthorizeFlow {
  operation: string;
  call: (input: CreatePaymentInput, options: ProviderCallOptions) => Promise<PaymentOutcome>;
  extraInput?: Partial<CreatePaymentInput>;
  prepare?: Mutation;
}

export const MAX_CONFLICT_ROUNDS = 3;
const DEFAULT_PROVIDER_TIMEOUT_MS = 10_000;
const PRE_AUTHORIZATION_STATUSES: ReadonlySet<AttemptStatus> = new Set(["initiated", "pending", "requires_action"]);
// An asynchronous completion only lands on an attempt the network is still deciding.
const AWAITING_COMPLETION_STATUSES: ReadonlySet<AttemptStatus> = new Set(["pending", "requires_action"]);

type ProviderFailure = Extract<ProviderCallResult<unknown>, { ok: false }>;

function failure(code: string, message: string): OperationResult {
  return { success: false, transaction_id: null, code, message };
}

/**
 * Single-writer owner of one payment attempt. Every operation runs through the
 * mailbox, re-reads the attempt, and commits through a version compare-and-set.
 * A commit that loses to another instance is re-applied on the winning record,
 * where the state machine decides whether the transition still holds.
 */
export abstract class ProcessorActor {
  readonly key: string;
  protected readonly store: AttemptStorePort;
  protected readonly client: ProviderClientPort;
  protected readonly circuitBreaker: CircuitBreakerPort;
  protected readonly retryPolicy: RetryPolicy;
  protected readonly logger: Logger;
  protected readonly clock: ClockPort;
  private readonly notifier: PaymentIntentNotifierPort;
  private readonly metrics: ProcessorMetricsRegistry | undefined;
  private readonly providerTimeoutMs: number;
  private readonly mintKey: (() => string) | undefined;
  private readonly mailbox = new ActorMailbox();
  protected record: PaymentAttemptRecord | null = null;

  constructor(
    readonly identity: AttemptIdentity,
    dependencies: ProcessorActorDependencies,
  ) {
    if (dependencies.client.name !== identity.provider) {
      throw new AppError(
        500,
        "provider_mismatch",
        `Client '${dependencies.client.name}' cannot serve '${identity.provider}' attempts.`,
      );
    }
    this.key = formatAttemptKey(identity);
    this.store = dependencies.store;
    this.client = dependencies.client;
    this.circuitBreaker = dependencies.circuitBreaker;
    this.retryPolicy = dependencies.retryPolicy;
    this.notifier = dependencies.notifier;
    this.logger = dependencies.logger.child({ attempt: this.key });
    this.clock = dependencies.clock ?? new SystemClock();
    this.metrics = dependencies.metrics;
    this.providerTimeoutMs = dependencies.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.mintKey = dependencies.mintKey;
  }

  get idle(): boolean {
    return this.mailbox.idle;
  }

  authorize(request: AuthorizeRequest): Promise<AuthorizeResult> {
    return this.serialized(
      () => this.authorizeWith(request, {
        operation: "authorize",
        call: (input, options) => this.client.createPayment(input, options),
      }),
      (result) => this.authorizeResultFor(this.record, result),
    );
  }

  capture(transactionId: string, amount?: number): Promise<CaptureResult> {
    return this.serialized(
      async () => {
        const record = await this.requireRecord();
        const captureAmount = amount ?? record.authorized_amount;
        const rejection = this.checkReference(record, transactionId)
          ?? (record.status !== "authorized" ? this.invalidState(record, "capture") : null)
          ?? this.checkAmount(captureAmount, record.authorized_amount, "authorized");
        if (rejection) {
          return this.captureResult(record, rejection);
        }

        const circuitOpen = await this.rejectIfCircuitOpen("capture");
        if (circuitOpen) {
          return this.captureResult(circuitOpen.record, circuitOpen.result);
        }

        const operation = `capture_${captureAmount}`;
        const idempotencyKey = await this.leaseKey(operation);
        const reference = transactionId;
        const call = await this.callProvider("capture", idempotencyKey, (options) =>
          this.client.capture({ reference, amount: captureAmount, currency: record.currency }, options),
        );

        const before = record.status;
        if (!call.ok) {
          const committed = await this.commitProcessingError("capture", call);
          return this.captureResult(committed, failure("processing_error", call.errorMessage));
        }
        const outcome = call.value;
        if (!outcome.success) {
          const committed = await this.commitRejectedOutcome("capture", outcome);
          return this.captureResult(committed, failure(outcome.errorCode, outcome.errorMessage));
        }

        const committed = await this.commit((draft) => {
          const now = this.clock.nowIso();
          if (this.transition(draft, "captured")) {
            draft.captured_amount = Math.min(captureAmount, draft.authorized_amount);
            draft.captured_at = now;
          }
          this.clearRetryState(draft, now);
          this.appendEvent(draft, "capture_succeeded", outcome.reference, { amount: captureAmount });
        });
        await this.notifyTransition(before, committed);
        return {
          ...this.captureResult(committed, { success: true, transaction_id: reference, code: null, message: null }),
          capture_id: outcome.reference,
        };
      },
      (result) => this.captureResult(this.loadedRecord(), result),
    );
  }

  refund(transactionId: string, amount: number, reason?: string): Promise<RefundResult> {
    return this.serialized(
      async () => {
        const record = await this.requireRecord();
        const refundable = record.captured_amount - record.refunded_amount;
        const rejection = this.checkReference(record, transactionId)
          ?? (record.status !== "captured" ? this.invalidState(record, "refund") : null)
          ?? this.checkAmount(amount, refundable, "refundable");
        if (rejection) {
          return this.refundResult(record, rejection);
        }

        const circuitOpen = await this.rejectIfCircuitOpen("refund");
        if (circuitOpen) {
          return this.refundResult(circuitOpen.record, circuitOpen.result);
        }

        // The sequence separates two genuine refunds of the same amount; a retry keeps it.
        const operation = `refund_${amount}_${record.refund_sequence}`;
        const idempotencyKey = await this.leaseKey(operation);
        const call = await this.callProvider("refund", idempotencyKey, (options) =>
          this.client.refund(
            { reference: transactionId, amount, currency: record.currency, ...(reason ? { reason } : {}) },
            options,
          ),
        );

        if (!call.ok) {
          const committed = await this.commitProcessingError("refund", call);
          return this.refundResult(committed, failure("processing_error", call.errorMessage));
        }
        const outcome = call.value;
        if (!outcome.success) {
          const committed = await this.commitRejectedOutcome("refund", outcome);
          return this.refundResult(committed, failure(outcome.errorCode, outcome.errorMessage));
        }

        const committed = await this.commit((draft) => {
          const now = this.clock.nowIso();
          if (draft.status === "captured" && draft.refunded_amount + amount <= draft.captured_amount) {
            draft.refunded_amount += amount;
            draft.refund_sequence += 1;
            if (draft.refunded_amount >= draft.captured_amount) {
              this.transition(draft, "refunded");
            }
          }
          this.clearRetryState(draft, now);
          this.appendEvent(draft, "refund_succeeded", outcome.reference, {
            amount,
            ...(reason ? { reason } : {}),
          });
        });
        return {
          ...this.refundResult(committed, { success: true, transaction_id: transactionId, code: null, message: null }),
          refund_id: outcome.reference,
        };
      },
      (result) => this.refundResult(this.loadedRecord(), result),
    );
  }

  void(transactionId: string, reason?: string): Promise<VoidResult> {
    return this.serialized(
      async () => {
        const record = await this.requireRecord();
        const rejection = this.checkReference(record, transactionId)
          ?? (record.status !== "authorized" ? this.invalidState(record, "void") : null);
        if (rejection) {
          return this.voidResult(record, rejection);
        }

        const circuitOpen = await this.rejectIfCircuitOpen("void");
        if (circuitOpen) {
          return this.voidResult(circuitOpen.record, circuitOpen.result);
        }

        const idempotencyKey = await this.leaseKey("void");
        const call = await this.callProvider("void", idempotencyKey, (options) =>
          this.client.cancel({ reference: transactionId, ...(reason ? { reason } : {}) }, options),
        );

        if (!call.ok) {
          const committed = await this.commitProcessingError("void", call);
          return this.voidResult(committed, failure("processing_error", call.errorMessage));
        }
        const outcome = call.value;
        if (!outcome.success) {
          const committed = await this.commitRejectedOutcome("void", outcome);
          return this.voidResult(committed, failure(outcome.errorCode, outcome.errorMessage));
        }

        const committed = await this.commit((draft) => {
          const now = this.clock.nowIso();
          if (this.transition(draft, "voided")) {
            draft.authorized_amount = 0;
            draft.canceled_at = now;
          }
          this.clearRetryState(draft, now);
          this.appendEvent(draft, "void_succeeded", outcome.reference, reason ? { reason } : null);
        });
        return {
          ...this.voidResult(committed, { success: true, transaction_id: transactionId, code: null, message: null }),
          void_id: outcome.reference,
        };
      },
      (result) => this.voidResult(this.loadedRecord(), result),
    );
  }

  handleWebhook(eventType: string, rawPayload: string, externalEventId: string | null = null): Promise<WebhookHandlingResult> {
    return this.mailbox.run(async () => {
      const record = await this.requireRecord();
      const transition = this.client.translateWebhookEvent(eventType, rawPayload);
      let applied = false;

      const committed = await this.commit((draft) => {
        applied = transition !== null && this.applyWebhookTransition(draft, transition);
        draft.events.push({
          at: this.clock.nowIso(),
          type: eventType,
          provider_reference: draft.provider_reference,
          external_event_id: externalEventId,
          payload: rawPayload,
        });
      });

      this.logger.info(
        { eventType, transition, applied, status: committed.status, settled: isTerminalStatus(record.status) },
        "webhook handled",
      );
      await this.notifyTransition(record.status, committed);
      return { applied, transition, status: committed.status, version: committed.version };
    });
  }

  getState(): Promise<AttemptStateView> {
    return this.mailbox.run(async () => {
      const record = await this.requireRecord();
      return {
        processor: record.provider,
        org_id: record.org_id,
        payment_intent_id: record.payment_intent_id,
        transaction_id: record.provider_reference,
        authorization_code: record.authorization_code,
        status: record.status,
        currency: record.currency,
        requested_amount: record.requested_amount,
        authorized_amount: record.authorized_amount,
        captured_amount: record.captured_amount,
        refunded_amount: record.refunded_amount,
        amount_refundable: record.captured_amount - record.refunded_amount,
        splits: record.splits.map((split) => ({ ...split })),
        retry_count: record.retry_count,
        next_retry_at: record.next_retry_at,
        last_attempt_at: record.last_attempt_at,
        last_error_code: record.last_error_code,
        last_error_message: record.last_error_message,
        next_action: record.next_action,
        version: record.version,
        events: record.events.map((event) => ({ ...event })),
      };
    });
  }

  /** Mints an authorization code when the network returns none. */
  protected resolveAuthorizationCode(authCode: string | null): string | null {
    return authCode;
  }

  protected paymentReference(): string {
    return this.identity.paymentIntentId;
  }

  protected serialized<TResult>(
    work: () => Promise<TResult>,
    onConflict: (result: OperationResult) => TResult,
  ): Promise<TResult> {
    return this.mailbox.run(async () => {
      try {
        return await work();
      } catch (error) {
        if (error instanceof AttemptVersionConflictError) {
          this.logger.warn({ err: error }, "attempt commit kept losing to concurrent writers");
          return onConflict(failure("processing_error", error.code));
        }
        throw error;
      }
    });
  }

  protected loadedRecord(): PaymentAttemptRecord {
    if (!this.record) {
      throw new AppError(404, "attempt_not_found", `Payment attempt '${this.key}' has not been authorized yet.`);
    }
    return this.record;
  }

  protected async authorizeWith(request: AuthorizeRequest, flow: AuthorizeFlow): Promise<AuthorizeResult> {
    const current = await this.load();
    if (!Number.isInteger(request.amount) || request.amount <= 0) {
      return this.authorizeResultFor(current, failure("invalid_amount", "Amount must be a positive integer in minor units."));
    }
    if (current && current.status !== "initiated") {
      return this.authorizeResultFor(current, this.invalidState(current, "authorize"));
    }

    const currency = request.currency.toUpperCase();
    const initialize: Mutation = (draft) => {
      if (draft.status !== "initiated") {
        return;
      }
      draft.requested_amount = request.amount;
      draft.currency = currency;
      draft.capture_automatically = request.autoCapture;
      draft.payment_method_token = request.paymentMethodToken;
      draft.statement_descriptor = request.statementDescriptor ?? null;
      draft.metadata = { ...(request.metadata ?? {}) };
      flow.prepare?.(draft);
    };

    const circuitOpen = await this.rejectIfCircuitOpen("authorization", initialize);
    if (circuitOpen) {
      return this.authorizeResultFor(circuitOpen.record, circuitOpen.result);
    }

    const idempotencyKey = await this.leaseKey(flow.operation, initialize);
    const input: CreatePaymentInput = {
      amount: request.amount,
      currency,
      paymentMethodToken: request.paymentMethodToken,
      autoCapture: request.autoCapture,
      reference: this.paymentReference(),
      metadata: { ...(request.metadata ?? {}), payment_intent_id: this.identity.paymentIntentId, org_id: this.identity.orgId },
      ...(request.statementDescriptor ? { statementDescriptor: request.statementDescriptor } : {}),
      ...(flow.extraInput ?? {}),
    };
    const call = await this.callProvider(flow.operation, idempotencyKey, (options) => flow.call(input, options));

    if (!call.ok) {
      const committed = await this.commitProcessingError("authorization", call, true);
      return this.authorizeResultFor(committed, failure("processing_error", call.errorMessage));
    }

    const outcome = call.value;
    const before = (await this.load())?.status ?? "initiated";
    const committed = await this.commit((draft) => this.applyAuthorizeOutcome(draft, outcome));
    await this.notifyTransition(before, committed);

    switch (outcome.status) {
      case "requires_action":
        return this.authorizeResultFor(committed, {
          success: false,
          transaction_id: outcome.reference,
          code: "requires_action",
          message: "Additional customer action is required.",
        });
      case "pending":
        return this.authorizeResultFor(committed, {
          success: false,
          transaction_id: outcome.reference,
          code: "pending",
          message: "Payment accepted for asynchronous processing.",
        });
      case "authorized":
      case "captured":
        return this.authorizeResultFor(committed, {
          success: true,
          transaction_id: outcome.reference,
          code: null,
          message: null,
        });
      default:
        return this.authorizeResultFor(committed, {
          success: false,
          transaction_id: outcome.reference,
          code: outcome.errorCode,
          message: outcome.errorMessage,
        });
    }
  }

  protected async load(): Promise<PaymentAttemptRecord | null> {
    this.record = await this.store.get(this.key);
    return this.record;
  }

  protected async requireRecord(): Promise<PaymentAttemptRecord> {
    await this.load();
    return this.loadedRecord();
  }

  /**
   * Applies `mutation` to a copy of the latest record and saves it with a version
   * check. On conflict the winner is reloaded and the mutation re-applied to it.
   */
  protected async commit(mutation: Mutation): Promise<PaymentAttemptRecord> {
    for (let round = 0; round <= MAX_CONFLICT_ROUNDS; round += 1) {
      const base = this.record;
      const expectedVersion = base?.version ?? 0;
      const draft = base ? structuredClone(base) : this.blankRecord();
      mutation(draft);
      draft.version = expectedVersion + 1;
      draft.updated_at = this.clock.nowIso();

      try {
        await this.store.save(draft, expectedVersion);
        this.record = draft;
        return draft;
      } catch (error) {
        if (!(error instanceof AttemptVersionConflictError) || round === MAX_CONFLICT_ROUNDS) {
          throw error;
        }
        this.logger.info({ expectedVersion, round }, "attempt changed concurrently, re-applying on latest version");
        await this.load();
      }
    }
    throw new AttemptVersionConflictError(this.key, this.record?.version ?? 0);
  }

  /** Returns the idempotency key for `operation`, persisting it first when newly minted. */
  protected async leaseKey(operation: string, prepare?: Mutation): Promise<string> {
    const current = this.record;
    if (current && !prepare) {
      const existing = this.registryFor(current).find(operation, current.retry_generation);
      if (existing) {
        return existing;
      }
    }

    const committed = await this.commit((draft) => {
      prepare?.(draft);
      draft.last_attempt_at = this.clock.nowIso();
      this.registryFor(draft).getOrCreate(operation, draft.retry_generation);
    });
    return this.registryFor(committed).getOrCreate(operation, committed.retry_generation).key;
  }

  protected async rejectIfCircuitOpen(
    operation: string,
    prepare?: Mutation,
  ): Promise<{ record: PaymentAttemptRecord; result: OperationResult } | null> {
    const circuitKey = circuitKeyFor(this.identity.provider, this.identity.orgId);
    if (!(await this.circuitBreaker.isOpen(circuitKey))) {
      return null;
    }

    this.metrics?.recordCircuitRejection(this.identity.provider);
    const message = `Circuit open for provider '${this.identity.provider}' in org '${this.identity.orgId}'.`;
    const record = await this.commit((draft) => {
      prepare?.(draft);
      draft.last_error_code = "circuit_open";
      draft.last_error_message = message;
      this.appendEvent(draft, `${operation}_circuit_open`, draft.provider_reference, null);
    });
    return { record, result: failure("circuit_open", message) };
  }

  protected async callProvider<TValue extends { status: string }>(
    operation: string,
    idempotencyKey: string,
    call: (options: ProviderCallOptions) => Promise<TValue>,
  ): Promise<ProviderCallResult<TValue>> {
    const result = await invokeProvider(this.providerTimeoutMs, idempotencyKey, call);
    if (!result.ok) {
      this.logger.warn({ operation, errorCode: result.errorCode, message: result.errorMessage }, "provider call failed");
    }
    const circuitKey = circuitKeyFor(this.identity.provider, this.identity.orgId);
    const outcomeLabel = await settleCircuit(this.circuitBreaker, circuitKey, result);
    this.metrics?.recordProviderCall(this.identity.provider, operation, outcomeLabel);
    return result;
  }

  protected async commitProcessingError(
    operation: string,
    failed: ProviderFailure,
    failWhenExhausted = false,
  ): Promise<PaymentAttemptRecord> {
    return this.commit((draft) => {
      const now = this.clock.nowIso();
      draft.last_attempt_at = now;
      draft.retry_count += 1;
      draft.last_error_code = "processing_error";
      draft.last_error_message = failed.errorMessage;
      if (this.retryPolicy.shouldRetry(draft.retry_count, failed.errorCode)) {
        draft.next_retry_at = this.retryPolicy.nextRetryTime(draft.retry_count);
      } else {
        draft.next_retry_at = null;
        if (failWhenExhausted) {
          this.transition(draft, "failed");
        }
      }
      this.appendEvent(draft, `${operation}_error`, draft.provider_reference, { error_code: failed.errorCode });
    });
  }

  protected async commitRejectedOutcome(
    operation: string,
    outcome: DeclinedOutcome | FailedOutcome,
  ): Promise<PaymentAttemptRecord> {
    return this.commit((draft) => {
      const now = this.clock.nowIso();
      draft.last_attempt_at = now;
      draft.last_error_code = outcome.errorCode;
      draft.last_error_message = outcome.errorMessage;
      if (outcome.status === "failed" && isRetryableError(outcome.errorCode)) {
        draft.retry_count += 1;
        draft.next_retry_at = this.retryPolicy.shouldRetry(draft.retry_count, outcome.errorCode)
          ? this.retryPolicy.nextRetryTime(draft.retry_count)
          : null;
      }
      this.appendEvent(draft, `${operation}_${outcome.status}`, outcome.reference ?? draft.provider_reference, {
        error_code: outcome.errorCode,
        provider_code: outcome.providerCode,
      });
    });
  }

  protected transition(draft: PaymentAttemptRecord, next: AttemptStatus): boolean {
    if (!canTransition(draft.status, next)) {
      return false;
    }
    draft.status = next;
    return true;
  }

  protected appendEvent(
    draft: PaymentAttemptRecord,
    type: string,
    providerReference: string | null,
    details: Record<string, unknown> | null,
  ): void {
    draft.events.push({
      at: this.clock.nowIso(),
      type,
      provider_reference: providerReference,
      external_event_id: null,
      payload: details ? JSON.stringify(details) : null,
    });
  }

  protected registryFor(record: PaymentAttemptRecord): IdempotencyKeyRegistry {
    return new IdempotencyKeyRegistry(record.payment_intent_id, record.idempotency_keys, this.mintKey);
  }

  /** With no record yet the attempt reads as freshly `initiated`. */
  protected authorizeResultFor(record: PaymentAttemptRecord | null, result: OperationResult): AuthorizeResult {
    return {
      ...result,
      transaction_id: result.transaction_id ?? record?.provider_reference ?? null,
      status: record?.status ?? "initiated",
      authorization_code: record?.authorization_code ?? null,
      network_transaction_id: record?.network_transaction_id ?? null,
      next_action: record?.next_action ?? null,
    };
  }

  protected authorizeFailure(code: string, message: string): AuthorizeResult {
    return this.authorizeResultFor(null, failure(code, message));
  }

  protected invalidState(record: PaymentAttemptRecord, operation: string): OperationResult {
    return failure("invalid_state", `Cannot ${operation} a payment in status '${record.status}'.`);
  }

  private applyAuthorizeOutcome(draft: PaymentAttemptRecord, outcome: PaymentOutcome): void {
    const now = this.clock.nowIso();
    draft.last_attempt_at = now;

    switch (outcome.status) {
      case "requires_action":
        if (this.transition(draft, "requires_action")) {
          draft.provider_reference = outcome.reference;
          draft.next_action = outcome.nextAction;
        }
        this.clearRetryState(draft, now);
        this.appendEvent(draft, "authorization_requires_action", outcome.reference, { type: outcome.nextAction.type });
        return;
      case "pending":
        if (this.transition(draft, "pending")) {
          draft.provider_reference = outcome.reference;
        }
        this.clearRetryState(draft, now);
        this.appendEvent(draft, "authorization_pending", outcome.reference, null);
        return;
      case "authorized":
      case "captured":
        if (this.transition(draft, outcome.status)) {
          draft.provider_reference = outcome.reference;
          draft.authorization_code = this.resolveAuthorizationCode(outcome.authCode);
          draft.network_transaction_id = outcome.networkTransactionId;
          draft.authorized_amount = outcome.amount;
          draft.authorized_at = now;
          draft.next_action = null;
          if (outcome.status === "captured") {
            draft.captured_amount = outcome.amount;
            draft.captured_at = now;
          }
        }
        this.clearRetryState(draft, now);
        this.appendEvent(draft, `authorization_${outcome.status === "captured" ? "captured" : "succeeded"}`, outcome.reference, {
          amount: outcome.amount,
        });
        return;
      case "declined":
      case "failed": {
        if (outcome.reference && !draft.provider_reference) {
          draft.provider_reference = outcome.reference;
        }
        draft.last_error_code = outcome.errorCode;
        draft.last_error_message = outcome.errorMessage;
        const retryable = isRetryableError(outcome.errorCode);
        if (retryable && outcome.status === "failed") {
          draft.retry_count += 1;
        }
        if (retryable && this.retryPolicy.shouldRetry(draft.retry_count, outcome.errorCode)) {
          // A definitive decline frees the next call to use a fresh key.
          if (outcome.status === "declined") {
            draft.retry_generation += 1;
          }
          draft.next_retry_at = this.retryPolicy.nextRetryTime(draft.retry_count);
        } else {
          draft.next_retry_at = null;
          this.transition(draft, "failed");
        }
        this.appendEvent(draft, `authorization_${outcome.status}`, outcome.reference, {
          error_code: outcome.errorCode,
          provider_code: outcome.providerCode,
        });
        return;
      }
    }
  }

  private applyWebhookTransition(draft: PaymentAttemptRecord, transition: WebhookTransition): boolean {
    const now = this.clock.nowIso();
    switch (transition) {
      case "authorization_completed": {
        if (!AWAITING_COMPLETION_STATUSES.has(draft.status)) {
          return false;
        }
        const target = draft.capture_automatically ? "captured" : "authorized";
        if (!this.transition(draft, target)) {
          return false;
        }
        draft.authorized_amount = draft.requested_amount;
        draft.authorized_at = now;
        draft.next_action = null;
        draft.last_error_code = null;
        draft.last_error_message = null;
        draft.next_retry_at = null;
        if (target === "captured") {
          draft.captured_amount = draft.requested_amount;
          draft.captured_at = now;
        }
        return true;
      }
      case "payment_failed":
        return PRE_AUTHORIZATION_STATUSES.has(draft.status) && this.transition(draft, "failed");
      case "capture_completed":
        if (draft.status !== "authorized" || !this.transition(draft, "captured")) {
          return false;
        }
        draft.captured_amount = draft.authorized_amount;
        draft.captured_at = now;
        return true;
      case "canceled":
        if (!this.transition(draft, "voided")) {
          return false;
        }
        draft.authorized_amount = 0;
        draft.canceled_at = now;
        return true;
      case "chargeback":
        return draft.status === "captured" && this.transition(draft, "disputed");
      case "refund_notice":
        return false;
      case "refund_failed":
        // The acknowledged refund already moved `refunded_amount`; the flag marks it for follow-up.
        if (draft.refunded_amount === 0) {
          return false;
        }
        draft.last_error_code = "refund_failed";
        draft.last_error_message = "The card network reported a refund as failed after acknowledging it.";
        return true;
    }
  }

  private async notifyTransition(before: AttemptStatus, record: PaymentAttemptRecord): Promise<void> {
    const reference = record.provider_reference;
    if (!reference || before === record.status) {
      return;
    }
    const nowAuthorized = record.status === "authorized" || record.status === "captured";
    const wasAuthorized = before === "authorized" || before === "captured";

    try {
      if (nowAuthorized && !wasAuthorized) {
        await this.notifier.recordAuthorization({
          orgId: record.org_id,
          paymentIntentId: record.payment_intent_id,
          providerReference: reference,
          authCode: record.authorization_code,
        });
      }
      if (record.status === "captured") {
        await this.notifier.recordCapture({
          orgId: record.org_id,
          paymentIntentId: record.payment_intent_id,
          providerReference: reference,
          capturedAmount: record.captured_amount,
        });
      }
    } catch (error) {
      this.logger.warn({ err: error, status: record.status }, "payment intent notification failed");
    }
  }

  private clearRetryState(draft: PaymentAttemptRecord, now: string): void {
    draft.last_attempt_at = now;
    draft.last_error_code = null;
    draft.last_error_message = null;
    draft.next_retry_at = null;
  }

  private checkReference(record: PaymentAttemptRecord, transactionId: string): OperationResult | null {
    if (record.provider_reference && record.provider_reference === transactionId) {
      return null;
    }
    return failure("invalid_transaction", `Transaction '${transactionId}' does not belong to this payment.`);
  }

  private checkAmount(amount: number, limit: number, label: string): OperationResult | null {
    if (!Number.isInteger(amount) || amount <= 0) {
      return failure("invalid_amount", "Amount must be a positive integer in minor units.");
    }
    if (amount > limit) {
      return failure("amount_too_large", `Amount ${amount} exceeds the ${label} amount ${limit}.`);
    }
    return null;
  }

  private captureResult(record: PaymentAttemptRecord, result: OperationResult): CaptureResult {
    return {
      ...result,
      transaction_id: result.transaction_id ?? record.provider_reference,
      status: record.status,
      capture_id: null,
      captured_amount: record.captured_amount,
    };
  }

  private refundResult(record: PaymentAttemptRecord, result: OperationResult): RefundResult {
    return {
      ...result,
      transaction_id: result.transaction_id ?? record.provider_reference,
      status: record.status,
      refund_id: null,
      refunded_amount: record.refunded_amount,
    };
  }

  private voidResult(record: PaymentAttemptRecord, result: OperationResult): VoidResult {
    return {
      ...result,
      transaction_id: result.transaction_id ?? record.provider_reference,
      status: record.status,
      void_id: null,
    };
  }

  private blankRecord(): PaymentAttemptRecord {
    const now = this.clock.nowIso();
    return {
      key: this.key,
      org_id: this.identity.orgId,
      provider: this.identity.provider,
      payment_intent_id: this.identity.paymentIntentId,
      status: "initiated",
      currency: "",
      requested_amount: 0,
      authorized_amount: 0,
      captured_amount: 0,
      refunded_amount: 0,
      capture_automatically: false,
      payment_method_token: null,
      statement_descriptor: null,
      metadata: {},
      provider_reference: null,
      authorization_code: null,
      network_transaction_id: null,
      next_action: null,
      connected_account_id: null,
      application_fee: null,
      splits: [],
      retry_count: 0,
      retry_generation: 0,
      refund_sequence: 0,
      next_retry_at: null,
      last_attempt_at: null,
      last_error_code: null,
      last_error_message: null,
      idempotency_keys: {},
      events: [],
      created_at: now,
      authorized_at: null,
      captured_at: null,
      canceled_at: null,
      updated_at: now,
      version: 0,
    };
  }
}
