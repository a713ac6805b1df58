import { createHmac, timingSafeEqual } from "node:crypto";
import type { Logger } from "pino";
import { DomainError } from "../../../domain/errors.js";
import { Money } from "../../../domain/money.js";
import type { Payment } from "../../../domain/payment.js";
import { fail, ok, type Result } from "../../../domain/result.js";
import type { CheckoutSession } from "../../../domain/types.js";
import {
  GATEWAY_FAILURE,
  type PaymentGatewayPort,
  type WebhookVerification,
} from "../../../ports/payment-gateway.js";
import { isTimeoutError } from "../../http/fetch.js";
import type { PaystackClient, PaystackHttpResponse, PaystackInitializePayload } from "./paystack-client.js";

const SUCCESS_EVENT = "charge.success";
const SIGNATURE_PATTERN = /^[0-9a-f]{128}$/i;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function readProviderMessage(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isObject(parsed) && typeof parsed.message === "string" && parsed.message.length > 0) {
      return parsed.message;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

function readAuthorizationUrl(body: unknown): string | undefined {
  if (!isObject(body) || !isObject(body.data)) {
    return undefined;
  }
  const url = body.data.authorization_url;
  return typeof url === "string" && url.length > 0 ? url : undefined;
}

interface PaystackGatewayOptions {
  secretKey: string;
}

export class PaystackGateway implements PaymentGatewayPort {
  readonly provider = "paystack" as const;
  readonly signatureHeader = "x-paystack-signature";

  constructor(
    private readonly client: PaystackClient,
    private readonly options: PaystackGatewayOptions,
    private readonly logger: Logger,
  ) {}

  async initialize(payment: Payment): Promise<Result<CheckoutSession>> {
    const log = this.logger.child({ provider: this.provider, reference: payment.reference.value });
    let payload: PaystackInitializePayload;
    try {
      payload = this.buildInitializePayload(payment);
    } catch (error) {
      if (error instanceof DomainError) {
        return fail(error.code, error.message);
      }
      throw error;
    }

    let response: PaystackHttpResponse;
    try {
      response = await this.client.initializeTransaction(payload);
    } catch (error) {
      if (isTimeoutError(error)) {
        log.error({ err: error }, "Timeout while calling Paystack API");
        return fail(GATEWAY_FAILURE.timeout, "Payment provider request timed out. Please try again.");
      }
      log.error({ err: error }, "Network error while calling Paystack API");
      return fail(GATEWAY_FAILURE.network, "Unable to connect to payment provider. Please try again.");
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      log.warn({ statusCode: response.statusCode }, "Paystack rejected transaction initialization");
      return this.mapProviderError(response.statusCode, response.body);
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch (error) {
      log.error({ err: error }, "Failed to parse Paystack response");
      return fail(GATEWAY_FAILURE.parse, "Invalid response format from payment provider");
    }

    const checkoutUrl = readAuthorizationUrl(body);
    if (!checkoutUrl) {
      log.error("Paystack response is missing the authorization URL");
      return fail(GATEWAY_FAILURE.malformedResponse, "Payment provider response is missing the checkout URL");
    }

    log.info({ checkoutUrl }, "Initialized Paystack transaction");
    return ok({ reference: payment.reference.value, checkoutUrl });
  }

  verifySignature(rawPayload: Buffer, signature: string): Result<boolean> {
    if (this.options.secretKey.length === 0) {
      return fail(GATEWAY_FAILURE.signatureVerification, "Paystack secret key is not configured");
    }
    const provided = signature.trim();
    if (!SIGNATURE_PATTERN.test(provided)) {
      return ok(false);
    }
    try {
      const expected = createHmac("sha512", this.options.secretKey).update(rawPayload).digest();
      return ok(timingSafeEqual(expected, Buffer.from(provided, "hex")));
    } catch (error) {
      this.logger.error({ err: error, provider: this.provider }, "Signature verification failed");
      return fail(GATEWAY_FAILURE.signatureVerification, "Signature verification failed");
    }
  }

  parseWebhook(rawPayload: Buffer): Result<WebhookVerification> {
    let envelope: unknown;
    try {
      envelope = JSON.parse(rawPayload.toString("utf8"));
    } catch {
      return fail(GATEWAY_FAILURE.malformedPayload, "Invalid JSON format");
    }

    if (!isObject(envelope) || typeof envelope.event !== "string") {
      return fail(GATEWAY_FAILURE.malformedPayload, "Invalid webhook envelope");
    }
    if (envelope.event !== SUCCESS_EVENT) {
      return fail(GATEWAY_FAILURE.unsupportedEvent, `Event type '${envelope.event}' is not processed`);
    }

    const data = envelope.data;
    if (!isObject(data)) {
      return fail(GATEWAY_FAILURE.malformedPayload, "Invalid webhook data");
    }
    const { reference, amount, currency } = data;
    if (typeof reference !== "string" || reference.trim().length === 0) {
      return fail(GATEWAY_FAILURE.malformedPayload, "Payment reference is empty");
    }
    if (typeof amount !== "number" || !Number.isSafeInteger(amount)) {
      return fail(GATEWAY_FAILURE.malformedPayload, "Amount must be an integer in minor units");
    }

    try {
      // Reported amounts are compared, not accepted, so no ceiling applies here.
      const received = Money.fromMinorUnit(
        amount,
        typeof currency === "string" ? currency : "NGN",
        Number.POSITIVE_INFINITY,
      );
      return ok({ reference: reference.trim(), amount: received });
    } catch (error) {
      if (error instanceof DomainError) {
        return fail(GATEWAY_FAILURE.malformedPayload, error.message);
      }
      throw error;
    }
  }

  private buildInitializePayload(payment: Payment): PaystackInitializePayload {
    return {
      email: payment.payer.value,
      amount: payment.amount.toMinorUnit(2),
      currency: payment.amount.currency,
      reference: payment.reference.value,
      callback_url: payment.redirectUrl.value,
      metadata: {
        internal_id: payment.id,
        reference: payment.reference.value,
        app_name: payment.appName,
        purpose: payment.purpose,
      },
    };
  }

  private mapProviderError(statusCode: number, body: string): Result<CheckoutSession> {
    const providerMessage = readProviderMessage(body) ?? "Payment initialization failed";
    switch (statusCode) {
      case 401:
        return fail("PROVIDER_AUTH_ERROR", "Payment provider authentication failed. Please contact support.");
      case 400:
        return fail("INVALID_REQUEST", `Invalid payment request: ${providerMessage}`);
      case 429:
        return fail("RATE_LIMIT_ERROR", "Too many payment requests. Please try again in a moment.");
      case 500:
      case 503:
        return fail("PROVIDER_UNAVAILABLE", "Payment provider is temporarily unavailable. Please try again.");
      default:
        return fail("PROVIDER_ERROR", `Payment initialization failed: ${providerMessage}`);
    }
  }
}
