import { randomUUID } from "node:crypto";

export interface IdempotencyKeyLease {
  key: string;
  minted: boolean;
}

export function idempotencySlot(operation: string, retryGeneration: number): string {
  return `${operation}_${retryGeneration}`;
}

/**
 * Per-attempt mapping of (operation, retry generation) to the key the provider
 * deduplicates on. Slots are insert-only; callers persist a freshly minted key
 * before the network call that uses it.
 */
export class IdempotencyKeyRegistry {
  constructor(
    private readonly paymentIntentId: string,
    private readonly keys: Record<string, string>,
    private readonly mint: () => string = randomUUID,
  ) {}

  getOrCreate(operation: string, retryGeneration: number): IdempotencyKeyLease {
    const slot = idempotencySlot(operation, retryGeneration);
    const existing = this.keys[slot];
    if (existing) {
      return { key: existing, minted: false };
    }

    const key = `idem_${this.paymentIntentId}_${operation}_${this.mint()}`;
    this.keys[slot] = key;
    return { key, minted: true };
  }

  find(operation: string, retryGeneration: number): string | null {
    return this.keys[idempotencySlot(operation, retryGeneration)] ?? null;
  }
}
