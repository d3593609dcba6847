import { describe, expect, it } from "vitest";
import { TerminalService } from "../src/application/terminal-service.js";
import { cardPayment, createHarness, silentLogger } from "./harness.js";

function createService() {
  const harness = createHarness();
  const service = new TerminalService({
    clients: harness.clients,
    circuitBreaker: harness.circuitBreaker,
    logger: silentLogger(),
    metrics: harness.metrics,
    providerTimeoutMs: 50,
  });
  return { ...harness, service };
}

describe("Terminal service", () => {
  it("pairs a reader and deduplicates a repeated pairing", async () => {
    const { service, stripeApi } = createService();
    const input = { registrationCode: "reg-123", label: "Front desk" };

    const first = await service.pairTerminal("org_1", "stripe", input);
    const second = await service.pairTerminal("org_1", "stripe", input);

    expect(first).toEqual({
      success: true,
      transaction_id: "tmr_sandbox_1",
      code: null,
      message: null,
      reader_id: "tmr_sandbox_1",
      reader_status: "online",
    });
    expect(second).toEqual(first);
    const keys = stripeApi.calls.map((call) => call.idempotencyKey);
    expect(keys).toHaveLength(2);
    expect(keys[0]).toMatch(/^idem_org_1_pair_[0-9a-f]{64}$/);
    expect(keys[1]).toBe(keys[0]);
  });

  it("reports a rejected registration code", async () => {
    const { service } = createService();

    const result = await service.pairTerminal("org_1", "stripe", { registrationCode: "invalid-code", label: "Till" });

    expect(result).toEqual({
      success: false,
      transaction_id: null,
      code: "invalid_request",
      message: "The registration code is invalid.",
      reader_id: null,
      reader_status: null,
    });
  });

  it("assigns a terminal on card network B", async () => {
    const { service } = createService();

    const result = await service.pairTerminal("org_1", "adyen", {
      registrationCode: "reg-9",
      label: "Kiosk",
      locationId: "store_1",
    });

    expect(result.reader_id).toBe("V400m-SANDBOX1");
    expect(result.reader_status).toBe("Assigned");
  });

  it("issues connection tokens", async () => {
    const { service } = createService();

    const result = await service.createConnectionToken("org_1", "stripe", "loc_1");

    expect(result).toEqual({ success: true, transaction_id: null, code: null, message: null, secret: "pst_sandbox_loc_1_1" });
  });

  it("reports connection tokens as unsupported on card network B", async () => {
    const { service } = createService();

    const result = await service.createConnectionToken("org_1", "adyen");

    expect(result.code).toBe("unsupported_operation");
    expect(result.message).toBe("Card network B does not support connection tokens.");
    expect(result.secret).toBeNull();
  });

  it("leaves the circuit untouched when the client answers without a network call", async () => {
    const { service, directory, circuitBreaker, metrics } = createService();
    await directory.adyen("org_y", "pi_t1").authorize(cardPayment("tok_test_timeout", false));
    await directory.adyen("org_y", "pi_t2").authorize(cardPayment("tok_test_timeout", false));

    const token = await service.createConnectionToken("org_y", "adyen");
    await directory.adyen("org_y", "pi_t3").authorize(cardPayment("tok_test_timeout", false));

    expect(token.code).toBe("unsupported_operation");
    expect(circuitBreaker.getState("adyen:org_y")).toMatchObject({ state: "open", failure_count: 3 });
    expect(metrics.renderPrometheus()).toContain(
      'ppc_provider_calls_total{provider="adyen",operation="connection_token",outcome="unsupported"} 1',
    );
  });

  it("refuses calls while the org circuit is open", async () => {
    const { service, circuitBreaker, stripeApi } = createService();
    for (let index = 0; index < 3; index += 1) {
      circuitBreaker.recordFailure("stripe:org_1");
    }

    const result = await service.pairTerminal("org_1", "stripe", { registrationCode: "reg-123", label: "Front desk" });

    expect(result.code).toBe("circuit_open");
    expect(result.message).toBe("Circuit open for provider 'stripe' in org 'org_1'.");
    expect(stripeApi.calls).toHaveLength(0);
  });
});
