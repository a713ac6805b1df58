import type { Money } from "../domain/money.js";
import type { Payment } from "../domain/payment.js";
import type { Result } from "../domain/result.js";
import type { CheckoutSession, PaymentProvider } from "../domain/types.js";

export interface WebhookVerification {
  reference: string;
  amount: Money;
}

export interface PaymentGatewayPort {
  readonly provider: PaymentProvider;
  /** Header carrying the provider's webhook signature, lower-cased. */
  readonly signatureHeader: string;
  initialize(payment: Payment): Promise<Result<CheckoutSession>>;
  verifySignature(rawPayload: Buffer, signature: string): Result<boolean>;
  parseWebhook(rawPayload: Buffer): Result<WebhookVerification>;
}

export const GATEWAY_FAILURE = {
  network: "NETWORK_ERROR",
  timeout: "TIMEOUT_ERROR",
  parse: "PARSE_ERROR",
  malformedResponse: "MALFORMED_PROVIDER_RESPONSE",
  signatureVerification: "SIGNATURE_VERIFICATION_ERROR",
  unsupportedEvent: "UNSUPPORTED_EVENT",
  malformedPayload: "MALFORMED_PAYLOAD",
} as const;
