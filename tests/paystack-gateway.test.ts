import { createHmac } from "node:crypto";
import { describe, expect, it } from "vitest";
import { PaystackClient } from "../src/adapters/providers/paystack/paystack-client.js";
import { PaystackGateway } from "../src/adapters/providers/paystack/paystack-gateway.js";
import { Money } from "../src/domain/money.js";
import { makeNoopLogger } from "../src/infra/logger.js";
import { newPayment } from "./fixtures.js";

const SECRET = "test-secret";

interface RecordedCall {
  url: string;
  init: RequestInit;
}

class FakeFetch {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: () => Promise<Response>) {}

  readonly fetch = async (url: string, init: RequestInit): Promise<Response> => {
    this.calls.push({ url, init });
    return this.respond();
  };
}

function jsonResponse(status: number, body: unknown): () => Promise<Response> {
  return async () => new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function buildGateway(respond: () => Promise<Response>, secretKey = SECRET): { gateway: PaystackGateway; fake: FakeFetch } {
  const fake = new FakeFetch(respond);
  const client = new PaystackClient({
    baseUrl: "https://paystack.test/",
    secretKey,
    timeoutMs: 1000,
    fetch: fake.fetch,
  });
  return { gateway: new PaystackGateway(client, { secretKey }, makeNoopLogger()), fake };
}

function sign(raw: Buffer | string, secret = SECRET): string {
  return createHmac("sha512", secret).update(raw).digest("hex");
}

function webhookBody(data: Record<string, unknown>, event = "charge.success"): Buffer {
  return Buffer.from(JSON.stringify({ event, data }));
}

describe("PaystackGateway.initialize", () => {
  it("posts the transaction in kobo with correlation metadata", async () => {
    const { gateway, fake } = buildGateway(
      jsonResponse(200, { status: true, data: { authorization_url: "https://checkout.test/abc", reference: "x" } }),
    );
    const payment = newPayment();

    const result = await gateway.initialize(payment);

    expect(result).toEqual({
      ok: true,
      value: { reference: payment.reference.value, checkoutUrl: "https://checkout.test/abc" },
    });
    expect(fake.calls).toHaveLength(1);
    const call = fake.calls[0];
    expect(call?.url).toBe("https://paystack.test/transaction/initialize");
    expect(call?.init.method).toBe("POST");
    expect(call?.init.headers).toMatchObject({ Authorization: `Bearer ${SECRET}` });
    expect(JSON.parse(String(call?.init.body))).toEqual({
      email: "buyer@example.com",
      amount: 500000,
      currency: "NGN",
      reference: payment.reference.value,
      callback_url: "https://shop.example/return",
      metadata: {
        internal_id: payment.id,
        reference: payment.reference.value,
        app_name: "Shop",
        purpose: "product_checkout",
      },
    });
  });

  it("fails when the checkout URL is missing", async () => {
    const { gateway } = buildGateway(jsonResponse(200, { status: true, data: {} }));
    const result = await gateway.initialize(newPayment());
    expect(result.ok ? undefined : result.error.code).toBe("MALFORMED_PROVIDER_RESPONSE");
  });

  it("fails when the response is not JSON", async () => {
    const { gateway } = buildGateway(async () => new Response("<html>oops</html>", { status: 200 }));
    const result = await gateway.initialize(newPayment());
    expect(result.ok ? undefined : result.error.code).toBe("PARSE_ERROR");
  });

  it.each([
    [401, "PROVIDER_AUTH_ERROR"],
    [400, "INVALID_REQUEST"],
    [429, "RATE_LIMIT_ERROR"],
    [500, "PROVIDER_UNAVAILABLE"],
    [503, "PROVIDER_UNAVAILABLE"],
    [422, "PROVIDER_ERROR"],
  ])("maps HTTP %i to %s", async (status, code) => {
    const { gateway } = buildGateway(jsonResponse(status, { status: false, message: "Invalid email" }));
    const result = await gateway.initialize(newPayment());
    expect(result.ok ? undefined : result.error.code).toBe(code);
  });

  it("includes the provider message for rejected requests", async () => {
    const { gateway } = buildGateway(jsonResponse(400, { status: false, message: "Invalid email" }));
    const result = await gateway.initialize(newPayment());
    expect(result.ok ? undefined : result.error.message).toBe("Invalid payment request: Invalid email");
  });

  it("reports timeouts and network errors", async () => {
    const timedOut = buildGateway(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });
    const unreachable = buildGateway(async () => {
      throw new TypeError("fetch failed");
    });

    const timeoutResult = await timedOut.gateway.initialize(newPayment());
    const networkResult = await unreachable.gateway.initialize(newPayment());
    expect(timeoutResult.ok ? undefined : timeoutResult.error.code).toBe("TIMEOUT_ERROR");
    expect(networkResult.ok ? undefined : networkResult.error.code).toBe("NETWORK_ERROR");
  });
});

describe("PaystackGateway.verifySignature", () => {
  const { gateway } = buildGateway(jsonResponse(200, {}));
  const raw = webhookBody({ reference: "PB_x", amount: 100 });

  it("accepts the HMAC-SHA512 of the raw bytes", () => {
    expect(gateway.verifySignature(raw, sign(raw))).toEqual({ ok: true, value: true });
    expect(gateway.verifySignature(raw, sign(raw).toUpperCase())).toEqual({ ok: true, value: true });
  });

  it("rejects tampered payloads and foreign signatures", () => {
    const tampered = Buffer.from(raw.toString("utf8").replace("100", "999"));
    expect(gateway.verifySignature(tampered, sign(raw))).toEqual({ ok: true, value: false });
    expect(gateway.verifySignature(raw, sign(raw, "other-secret"))).toEqual({ ok: true, value: false });
    expect(gateway.verifySignature(raw, "")).toEqual({ ok: true, value: false });
    expect(gateway.verifySignature(raw, "not-hex")).toEqual({ ok: true, value: false });
  });

  it("checks the bytes received rather than re-serialized JSON", () => {
    const spaced = Buffer.from('{ "event": "charge.success", "data": { "reference": "PB_x", "amount": 100 } }');
    const compact = Buffer.from(JSON.stringify(JSON.parse(spaced.toString("utf8"))));
    expect(gateway.verifySignature(spaced, sign(spaced))).toEqual({ ok: true, value: true });
    expect(gateway.verifySignature(compact, sign(spaced))).toEqual({ ok: true, value: false });
  });

  it("fails when no secret is configured", () => {
    const { gateway: unconfigured } = buildGateway(jsonResponse(200, {}), "");
    const result = unconfigured.verifySignature(raw, sign(raw));
    expect(result.ok ? undefined : result.error.code).toBe("SIGNATURE_VERIFICATION_ERROR");
  });
});

describe("PaystackGateway.parseWebhook", () => {
  const { gateway } = buildGateway(jsonResponse(200, {}));
  const reference = "PB_0123456789abcdef0123456789abcdef";

  it("extracts the reference and converts kobo to naira", () => {
    const result = gateway.parseWebhook(webhookBody({ reference, amount: 500000, currency: "NGN" }));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.reference).toBe(reference);
      expect(result.value.amount.equals(Money.create(5000, "NGN"))).toBe(true);
    }
  });

  it("defaults the currency to NGN", () => {
    const result = gateway.parseWebhook(webhookBody({ reference, amount: 150 }));
    expect(result.ok && result.value.amount.toString()).toBe("NGN 1.50");
  });

  it("ignores events other than a successful charge", () => {
    const result = gateway.parseWebhook(webhookBody({ reference, amount: 100 }, "transfer.success"));
    expect(result.ok ? undefined : result.error.code).toBe("UNSUPPORTED_EVENT");
  });

  it.each([
    ["invalid JSON", Buffer.from("{not json")],
    ["missing event", Buffer.from(JSON.stringify({ data: { reference, amount: 100 } }))],
    ["missing data", Buffer.from(JSON.stringify({ event: "charge.success" }))],
    ["empty reference", webhookBody({ reference: "  ", amount: 100 })],
    ["fractional amount", webhookBody({ reference, amount: 10.5 })],
    ["zero amount", webhookBody({ reference, amount: 0 })],
    ["unknown currency", webhookBody({ reference, amount: 100, currency: "XYZ" })],
  ])("rejects %s as malformed", (_label, raw) => {
    const result = gateway.parseWebhook(raw);
    expect(result.ok ? undefined : result.error.code).toBe("MALFORMED_PAYLOAD");
  });
});
