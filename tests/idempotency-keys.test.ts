import { describe, expect, it } from "vitest";
import { IdempotencyKeyRegistry, idempotencySlot } from "../src/application/idempotency-keys.js";

describe("Idempotency key registry", () => {
  it("returns the same key for a repeated operation and generation", () => {
    const keys: Record<string, string> = {};
    const registry = new IdempotencyKeyRegistry("pi_1", keys, () => "u1");

    expect(registry.getOrCreate("capture_1000", 0)).toEqual({ key: "idem_pi_1_capture_1000_u1", minted: true });
    expect(registry.getOrCreate("capture_1000", 0)).toEqual({ key: "idem_pi_1_capture_1000_u1", minted: false });
    expect(keys).toEqual({ capture_1000_0: "idem_pi_1_capture_1000_u1" });
  });

  it("mints a new key for a new generation", () => {
    let counter = 0;
    const registry = new IdempotencyKeyRegistry("pi_1", {}, () => {
      counter += 1;
      return `u${counter}`;
    });

    registry.getOrCreate("authorize", 0);
    expect(registry.getOrCreate("authorize", 1).key).toBe("idem_pi_1_authorize_u2");
    expect(registry.find("authorize", 0)).toBe("idem_pi_1_authorize_u1");
  });

  it("finds nothing before a key is minted", () => {
    const registry = new IdempotencyKeyRegistry("pi_1", {});

    expect(registry.find("void", 0)).toBeNull();
    expect(idempotencySlot("void", 2)).toBe("void_2");
  });
});
