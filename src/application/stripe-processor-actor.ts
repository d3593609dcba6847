import { randomInt } from "node:crypto";
import type { AuthorizeRequest, AuthorizeResult, SetupIntentResult } from "../domain/types.js";
import { ProcessorActor } from "./processor-actor.js";

/**
 * Card-network A. Adds connected-account authorizations and setup intents for
 * vaulting a payment method; the network issues no authorization codes of its own.
 */
export class StripeProcessorActor extends ProcessorActor {
  authorizeOnBehalfOf(
    request: AuthorizeRequest,
    connectedAccountId: string,
    applicationFee?: number,
  ): Promise<AuthorizeResult> {
    return this.serialized(
      async () => {
        if (applicationFee !== undefined && (!Number.isInteger(applicationFee) || applicationFee < 0 || applicationFee > request.amount)) {
          return this.authorizeFailure("invalid_amount", "Application fee must be an integer between 0 and the amount.");
        }
        return this.authorizeWith(request, {
          operation: "authorize",
          call: (input, options) => this.client.createPayment(input, options),
          extraInput: {
            connectedAccountId,
            ...(applicationFee !== undefined ? { applicationFee } : {}),
          },
          prepare: (draft) => {
            draft.connected_account_id = connectedAccountId;
            draft.application_fee = applicationFee ?? null;
          },
        });
      },
      (result) => this.authorizeResultFor(this.record, result),
    );
  }

  createSetupIntent(customerId: string): Promise<SetupIntentResult> {
    return this.serialized(
      async () => {
        await this.load();
        const circuitOpen = await this.rejectIfCircuitOpen("setup_intent");
        if (circuitOpen) {
          return { ...circuitOpen.result, setup_intent_id: null, client_secret: null };
        }

        const idempotencyKey = await this.leaseKey(`setup_${customerId}`);
        const call = await this.callProvider("setup_intent", idempotencyKey, (options) =>
          this.client.createSetupIntent(customerId, options),
        );
        if (!call.ok) {
          await this.commitProcessingError("setup_intent", call);
          return {
            success: false,
            transaction_id: null,
            code: "processing_error",
            message: call.errorMessage,
            setup_intent_id: null,
            client_secret: null,
          };
        }

        const outcome = call.value;
        if (!outcome.success) {
          await this.commitRejectedOutcome("setup_intent", outcome);
          return {
            success: false,
            transaction_id: null,
            code: outcome.errorCode,
            message: outcome.errorMessage,
            setup_intent_id: null,
            client_secret: null,
          };
        }

        await this.commit((draft) => {
          this.appendEvent(draft, "setup_intent_created", outcome.reference, { customer_id: customerId });
        });
        return {
          success: true,
          transaction_id: outcome.reference,
          code: null,
          message: null,
          setup_intent_id: outcome.reference,
          client_secret: outcome.clientSecret,
        };
      },
      (result) => ({ ...result, setup_intent_id: null, client_secret: null }),
    );
  }

  protected override resolveAuthorizationCode(authCode: string | null): string | null {
    return authCode ?? String(randomInt(100_000, 1_000_000));
  }
}
