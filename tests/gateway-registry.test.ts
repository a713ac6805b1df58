import { describe, expect, it } from "vitest";
import { GatewayRegistry } from "../src/application/gateway-registry.js";
import { fail, ok } from "../src/domain/result.js";
import type { PaymentProvider } from "../src/domain/types.js";
import type { PaymentGatewayPort } from "../src/ports/payment-gateway.js";

function namedGateway(provider: PaymentProvider): PaymentGatewayPort {
  return {
    provider,
    signatureHeader: `x-${provider}-signature`,
    initialize: async () => fail("PROVIDER_ERROR", "not used"),
    verifySignature: () => ok(false),
    parseWebhook: () => fail("MALFORMED_PAYLOAD", "not used"),
  };
}

describe("GatewayRegistry", () => {
  const paystack = namedGateway("paystack");
  const registry = new GatewayRegistry([paystack]);

  it("resolves registered providers by tag", () => {
    expect(registry.resolve("paystack")).toBe(paystack);
    expect(registry.resolve("flutterwave")).toBeUndefined();
    expect(registry.providers()).toEqual(["paystack"]);
  });

  it("finds gateways by URL name regardless of case", () => {
    expect(registry.findByName("paystack")).toBe(paystack);
    expect(registry.findByName("PayStack")).toBe(paystack);
    expect(registry.findByName(" paystack ")).toBe(paystack);
    expect(registry.findByName("flutterwave")).toBeUndefined();
    expect(registry.findByName("stripe")).toBeUndefined();
  });

  it("keeps the last gateway registered for a provider", () => {
    const replacement = namedGateway("paystack");
    const overridden = new GatewayRegistry([paystack, replacement]);
    expect(overridden.resolve("paystack")).toBe(replacement);
    expect(overridden.providers()).toEqual(["paystack"]);
  });
});
