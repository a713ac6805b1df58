export const PAYMENT_PROVIDERS = ["paystack", "flutterwave"] as const;
export type PaymentProvider = (typeof PAYMENT_PROVIDERS)[number];

export const PAYMENT_PURPOSES = ["product_checkout", "wallet_funding", "subscription", "invoice"] as const;
export type PaymentPurpose = (typeof PAYMENT_PURPOSES)[number];

export const SUPPORTED_CURRENCIES = ["NGN", "USD", "GBP", "EUR"] as const;
export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

export type PaymentStatus = "pending" | "success" | "failed";

export type PaymentProcessingResult = "success" | "amount_mismatch";

export interface PaymentSnapshot {
  id: string;
  reference: string;
  provider: PaymentProvider;
  purpose: PaymentPurpose;
  amount: number;
  currency: CurrencyCode;
  payer_email: string;
  app_name: string;
  external_reference: string;
  redirect_url: string;
  notification_url: string;
  status: PaymentStatus;
  created_at: string;
  verified_at: string | null;
}

export interface InitializePaymentInput {
  externalUserId: string;
  amount: number;
  currency?: string;
  purpose: PaymentPurpose;
  provider: PaymentProvider;
  appName: string;
  externalReference: string;
  redirectUrl: string;
  notificationUrl: string;
}

export interface CheckoutSession {
  reference: string;
  checkoutUrl: string;
}

export type WebhookOutcome =
  | { status: "processed"; reference: string }
  | { status: "ignored"; reason: string; reference?: string }
  | { status: "failed"; reason: string; reference?: string };

export interface PaymentNotification {
  paymentReference: string;
  externalReference: string;
  status: PaymentStatus;
  amount: number;
}

export function isPaymentProvider(value: string): value is PaymentProvider {
  const allowed: readonly string[] = PAYMENT_PROVIDERS;
  return allowed.includes(value);
}

export function isPaymentPurpose(value: string): value is PaymentPurpose {
  const allowed: readonly string[] = PAYMENT_PURPOSES;
  return allowed.includes(value);
}

export function isCurrencyCode(value: string): value is CurrencyCode {
  const allowed: readonly string[] = SUPPORTED_CURRENCIES;
  return allowed.includes(value);
}
