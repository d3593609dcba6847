import { MERCHANT_REFERENCE_PREFIX } from "../domain/attempt-key.js";
import type { AuthorizeRequest, AuthorizeResult, SplitAllocation } from "../domain/types.js";
import { ProcessorActor } from "./processor-actor.js";

/**
 * Card-network B. Supports marketplace split authorizations and answers some
 * payments asynchronously, leaving them `pending` until a notification lands.
 */
export class AdyenProcessorActor extends ProcessorActor {
  authorizeWithSplit(request: AuthorizeRequest, splits: SplitAllocation[]): Promise<AuthorizeResult> {
    return this.serialized(
      async () => {
        const splitTotal = splits.reduce((total, split) => total + split.amount, 0);
        const malformed = splits.length === 0
          || splits.some((split) => !Number.isInteger(split.amount) || split.amount <= 0 || split.account.length === 0);
        if (malformed || splitTotal !== request.amount) {
          return this.authorizeFailure(
            "invalid_split",
            `Split amounts must be positive and add up to ${request.amount}; got ${splitTotal}.`,
          );
        }

        return this.authorizeWith(request, {
          operation: "authorize_split",
          call: (input, options) => this.client.createSplitPayment(input, splits, options),
          prepare: (draft) => {
            draft.splits = splits.map((split) => ({ ...split }));
          },
        });
      },
      (result) => this.authorizeResultFor(this.record, result),
    );
  }

  protected override paymentReference(): string {
    return `${MERCHANT_REFERENCE_PREFIX}${this.identity.paymentIntentId}`;
  }
}
