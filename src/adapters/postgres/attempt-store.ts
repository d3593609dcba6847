import type { Pool } from "pg";
import type { PaymentAttemptRecord, ProviderName } from "../../domain/types.js";
import { AttemptVersionConflictError } from "../../infra/app-error.js";
import type { AttemptStorePort } from "../../ports/attempt-store.js";

/**
 * One row per attempt in `processor_attempts`. The record itself lives in a
 * JSONB column; `version` and `provider_reference` are lifted out for the
 * compare-and-set and the webhook lookup.
 */
export class PostgresAttemptStore implements AttemptStorePort {
  constructor(private readonly pool: Pool) {}

  async get(key: string): Promise<PaymentAttemptRecord | null> {
    const result = await this.pool.query<{ record: PaymentAttemptRecord }>(
      `
        SELECT record
        FROM processor_attempts
        WHERE key = $1
      `,
      [key],
    );
    return result.rows[0]?.record ?? null;
  }

  async save(record: PaymentAttemptRecord, expectedVersion: number): Promise<void> {
    const result =
      expectedVersion === 0
        ? await this.pool.query(
            `
              INSERT INTO processor_attempts (
                key,
                org_id,
                provider,
                payment_intent_id,
                provider_reference,
                status,
                version,
                record,
                updated_at
              )
              VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::timestamptz)
              ON CONFLICT (key) DO NOTHING
            `,
            [
              record.key,
              record.org_id,
              record.provider,
              record.payment_intent_id,
              record.provider_reference,
              record.status,
              record.version,
              JSON.stringify(record),
              record.updated_at,
            ],
          )
        : await this.pool.query(
            `
              UPDATE processor_attempts
              SET provider_reference = $2,
                  status = $3,
                  version = $4,
                  record = $5::jsonb,
                  updated_at = $6::timestamptz
              WHERE key = $1
                AND version = $7
            `,
            [
              record.key,
              record.provider_reference,
              record.status,
              record.version,
              JSON.stringify(record),
              record.updated_at,
              expectedVersion,
            ],
          );

    if (result.rowCount !== 1) {
      throw new AttemptVersionConflictError(record.key, expectedVersion);
    }
  }

  async findKeyByProviderReference(provider: ProviderName, providerReference: string): Promise<string | null> {
    const result = await this.pool.query<{ key: string }>(
      `
        SELECT key
        FROM processor_attempts
        WHERE provider = $1
          AND provider_reference = $2
        ORDER BY updated_at DESC
        LIMIT 1
      `,
      [provider, providerReference],
    );
    return result.rows[0]?.key ?? null;
  }

  async findKeysByPaymentIntent(provider: ProviderName, paymentIntentId: string): Promise<string[]> {
    const result = await this.pool.query<{ key: string }>(
      `
        SELECT key
        FROM processor_attempts
        WHERE provider = $1
          AND payment_intent_id = $2
        ORDER BY key
      `,
      [provider, paymentIntentId],
    );
    return result.rows.map((row) => row.key);
  }
}
