import type { PaymentAttemptRecord, ProviderName } from "../domain/types.js";

export interface AttemptStorePort {
  get(key: string): Promise<PaymentAttemptRecord | null>;
  /**
   * Compare-and-set on `version`. `expectedVersion` 0 means the key must not exist yet.
   * Throws `AttemptVersionConflictError` when another writer got there first.
   */
  save(record: PaymentAttemptRecord, expectedVersion: number): Promise<void>;
  findKeyByProviderReference(provider: ProviderName, providerReference: string): Promise<string | null>;
  /** Every org's attempt for `paymentIntentId` on `provider`; webhooks that arrive before a reference is known resolve here. */
  findKeysByPaymentIntent(provider: ProviderName, paymentIntentId: string): Promise<string[]>;
}
