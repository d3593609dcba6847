import { formatAttemptKey, parseAttemptKey, type AttemptIdentity } from "../domain/attempt-key.js";
import type { ProviderClientSet } from "../ports/provider-client.js";
import { AdyenProcessorActor } from "./adyen-processor-actor.js";
import type { ProcessorActor, ProcessorActorDependencies } from "./processor-actor.js";
import { StripeProcessorActor } from "./stripe-processor-actor.js";

export interface ProcessorActorDirectoryOptions extends Omit<ProcessorActorDependencies, "client"> {
  clients: ProviderClientSet;
}

/**
 * Hands out one activation per attempt key. Activations hold no state the
 * store does not have, so idle ones can be dropped at any time.
 */
export class ProcessorActorDirectory {
  private readonly stripeActors = new Map<string, StripeProcessorActor>();
  private readonly adyenActors = new Map<string, AdyenProcessorActor>();

  constructor(private readonly options: ProcessorActorDirectoryOptions) {}

  get size(): number {
    return this.stripeActors.size + this.adyenActors.size;
  }

  stripe(orgId: string, paymentIntentId: string): StripeProcessorActor {
    const identity: AttemptIdentity = { orgId, provider: "stripe", paymentIntentId };
    return this.activate(this.stripeActors, identity, () =>
      new StripeProcessorActor(identity, this.dependenciesFor(identity)),
    );
  }

  adyen(orgId: string, paymentIntentId: string): AdyenProcessorActor {
    const identity: AttemptIdentity = { orgId, provider: "adyen", paymentIntentId };
    return this.activate(this.adyenActors, identity, () =>
      new AdyenProcessorActor(identity, this.dependenciesFor(identity)),
    );
  }

  resolve(identity: AttemptIdentity): ProcessorActor {
    return identity.provider === "stripe"
      ? this.stripe(identity.orgId, identity.paymentIntentId)
      : this.adyen(identity.orgId, identity.paymentIntentId);
  }

  resolveKey(key: string): ProcessorActor {
    return this.resolve(parseAttemptKey(key));
  }

  /** Drops activations with nothing queued. Returns how many were dropped. */
  deactivateIdle(): number {
    let dropped = 0;
    for (const actors of [this.stripeActors, this.adyenActors]) {
      for (const [key, actor] of actors) {
        if (actor.idle) {
          actors.delete(key);
          dropped += 1;
        }
      }
    }
    return dropped;
  }

  private activate<TActor extends ProcessorActor>(
    actors: Map<string, TActor>,
    identity: AttemptIdentity,
    create: () => TActor,
  ): TActor {
    const key = formatAttemptKey(identity);
    const existing = actors.get(key);
    if (existing) {
      return existing;
    }
    const actor = create();
    actors.set(key, actor);
    return actor;
  }

  private dependenciesFor(identity: AttemptIdentity): ProcessorActorDependencies {
    const { clients, ...shared } = this.options;
    return { ...shared, client: clients[identity.provider] };
  }
}
