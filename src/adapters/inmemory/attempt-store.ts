import type { PaymentAttemptRecord, ProviderName } from "../../domain/types.js";
import { AttemptVersionConflictError } from "../../infra/app-error.js";
import type { AttemptStorePort } from "../../ports/attempt-store.js";

export class InMemoryAttemptStore implements AttemptStorePort {
  private readonly records = new Map<string, PaymentAttemptRecord>();
  private readonly keysByReference = new Map<string, string>();

  async get(key: string): Promise<PaymentAttemptRecord | null> {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  async save(record: PaymentAttemptRecord, expectedVersion: number): Promise<void> {
    const currentVersion = this.records.get(record.key)?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      throw new AttemptVersionConflictError(record.key, expectedVersion);
    }
    this.records.set(record.key, structuredClone(record));
    if (record.provider_reference) {
      this.keysByReference.set(`${record.provider}:${record.provider_reference}`, record.key);
    }
  }

  async findKeyByProviderReference(provider: ProviderName, providerReference: string): Promise<string | null> {
    return this.keysByReference.get(`${provider}:${providerReference}`) ?? null;
  }

  async findKeysByPaymentIntent(provider: ProviderName, paymentIntentId: string): Promise<string[]> {
    return [...this.records.values()]
      .filter((record) => record.provider === provider && record.payment_intent_id === paymentIntentId)
      .map((record) => record.key);
  }

  get size(): number {
    return this.records.size;
  }
}
