import { describe, expect, it } from "vitest";
import { PaymentStateError } from "../src/domain/errors.js";
import { Money } from "../src/domain/money.js";
import { Payment } from "../src/domain/payment.js";
import { CREATED_AT, newPayment, paymentProps } from "./fixtures.js";

const VERIFIED_AT = "2026-03-01T09:05:00.000Z";

function stateErrorCode(action: () => unknown): string | undefined {
  try {
    action();
  } catch (error) {
    return error instanceof PaymentStateError ? error.code : "unexpected";
  }
  return undefined;
}

describe("Payment", () => {
  it("starts pending without a verification time", () => {
    const payment = newPayment();
    expect(payment.status).toBe("pending");
    expect(payment.isPending).toBe(true);
    expect(payment.verifiedAt).toBeNull();
    expect(payment.createdAt).toBe(CREATED_AT);
    expect(payment.reference.value).toMatch(/^PB_[a-f0-9]{32}$/);
  });

  it("trims and requires the idempotency key parts", () => {
    const payment = newPayment({ appName: "  Shop ", externalReference: " ORDER-9 " });
    expect(payment.appName).toBe("Shop");
    expect(payment.externalReference).toBe("ORDER-9");
    expect(stateErrorCode(() => newPayment({ appName: " " }))).toBe("APP_NAME_REQUIRED");
    expect(stateErrorCode(() => newPayment({ externalReference: "" }))).toBe("EXTERNAL_REFERENCE_REQUIRED");
  });

  it("succeeds when the received amount matches", () => {
    const payment = newPayment();
    expect(payment.processSuccessfulPayment(Money.create(5000, "NGN"), VERIFIED_AT)).toBe("success");
    expect(payment.status).toBe("success");
    expect(payment.verifiedAt).toBe(VERIFIED_AT);
  });

  it("fails on a different amount or currency", () => {
    const short = newPayment();
    expect(short.processSuccessfulPayment(Money.create(4999.99, "NGN"), VERIFIED_AT)).toBe("amount_mismatch");
    expect(short.status).toBe("failed");
    expect(short.verifiedAt).toBe(VERIFIED_AT);

    const wrongCurrency = newPayment();
    expect(wrongCurrency.processSuccessfulPayment(Money.create(5000, "USD"), VERIFIED_AT)).toBe(
      "amount_mismatch",
    );
  });

  it("refuses to process a settled payment twice", () => {
    const payment = newPayment();
    payment.processSuccessfulPayment(Money.create(5000, "NGN"), VERIFIED_AT);

    expect(
      stateErrorCode(() => payment.processSuccessfulPayment(Money.create(5000, "NGN"), "2026-03-02T00:00:00.000Z")),
    ).toBe("ALREADY_PROCESSED");
    expect(stateErrorCode(() => payment.processSuccessfulPayment(Money.create(1, "NGN"), VERIFIED_AT))).toBe(
      "ALREADY_PROCESSED",
    );
    expect(payment.status).toBe("success");
    expect(payment.verifiedAt).toBe(VERIFIED_AT);
  });

  it("marks a failed initialization only while pending", () => {
    const payment = newPayment();
    payment.markInitializationFailed(VERIFIED_AT);
    expect(payment.status).toBe("failed");

    const settled = newPayment();
    settled.processSuccessfulPayment(Money.create(5000, "NGN"), VERIFIED_AT);
    settled.markInitializationFailed("2026-03-02T00:00:00.000Z");
    expect(settled.status).toBe("success");
    expect(settled.verifiedAt).toBe(VERIFIED_AT);
  });

  it("round-trips through a snapshot", () => {
    const payment = newPayment();
    payment.processSuccessfulPayment(Money.create(5000, "NGN"), VERIFIED_AT);
    const snapshot = payment.toSnapshot();

    expect(snapshot).toMatchObject({
      provider: "paystack",
      purpose: "product_checkout",
      amount: 5000,
      currency: "NGN",
      payer_email: "buyer@example.com",
      app_name: "Shop",
      external_reference: "ORDER-1",
      redirect_url: "https://shop.example/return",
      notification_url: "https://shop.example/hooks/payments",
      status: "success",
      created_at: CREATED_AT,
      verified_at: VERIFIED_AT,
    });
    expect(Payment.restore(snapshot).toSnapshot()).toEqual(snapshot);
  });

  it("refuses to restore an inconsistent snapshot", () => {
    const snapshot = newPayment().toSnapshot();
    expect(stateErrorCode(() => Payment.restore({ ...snapshot, status: "success" }))).toBe("INCONSISTENT_STATE");
    expect(stateErrorCode(() => Payment.restore({ ...snapshot, verified_at: VERIFIED_AT }))).toBe(
      "INCONSISTENT_STATE",
    );
  });

  it("restores amounts above the current ceiling", () => {
    const snapshot = Payment.create(
      paymentProps({ amount: Money.create(200_000_000, "NGN", 500_000_000) }),
      CREATED_AT,
    ).toSnapshot();
    expect(Payment.restore(snapshot).amount.amount).toBe(200_000_000);
  });
});
