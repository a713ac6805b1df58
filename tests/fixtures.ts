import { CallbackUrl } from "../src/domain/callback-url.js";
import { EmailAddress } from "../src/domain/email-address.js";
import { Money } from "../src/domain/money.js";
import { Payment, type NewPaymentProps } from "../src/domain/payment.js";
import type { ClockPort } from "../src/infra/clock.js";

export const CREATED_AT = "2026-03-01T09:00:00.000Z";

export class MutableClock implements ClockPort {
  constructor(private now: string = CREATED_AT) {}

  nowIso(): string {
    return this.now;
  }

  setNow(nextNow: string): void {
    this.now = nextNow;
  }
}

export function paymentProps(overrides: Partial<NewPaymentProps> = {}): NewPaymentProps {
  return {
    provider: "paystack",
    purpose: "product_checkout",
    amount: Money.create(5000, "NGN"),
    payer: EmailAddress.create("buyer@example.com"),
    appName: "Shop",
    externalReference: "ORDER-1",
    redirectUrl: CallbackUrl.create("https://shop.example/return"),
    notificationUrl: CallbackUrl.create("https://shop.example/hooks/payments"),
    ...overrides,
  };
}

export function newPayment(overrides: Partial<NewPaymentProps> = {}): Payment {
  return Payment.create(paymentProps(overrides), CREATED_AT);
}
