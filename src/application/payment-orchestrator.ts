import type { Logger } from "pino";
import { CallbackUrl } from "../domain/callback-url.js";
import { EmailAddress } from "../domain/email-address.js";
import { DomainError, PaymentStateError } from "../domain/errors.js";
import { DEFAULT_MAX_AMOUNT, Money } from "../domain/money.js";
import { Payment } from "../domain/payment.js";
import { PaymentReference } from "../domain/payment-reference.js";
import { fail, type Result } from "../domain/result.js";
import type {
  CheckoutSession,
  InitializePaymentInput,
  PaymentProcessingResult,
  WebhookOutcome,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { GATEWAY_FAILURE } from "../ports/payment-gateway.js";
import type { NotificationSinkPort } from "../ports/notification-sink.js";
import type { PaymentStorePort, PaymentStoreSession } from "../ports/payment-store.js";
import type { GatewayRegistry } from "./gateway-registry.js";

interface PaymentOrchestratorOptions {
  maxAmount: number;
}

function toFailure<T>(error: unknown): Result<T> {
  if (error instanceof AppError) {
    return fail(error.code, error.message);
  }
  return fail("INTERNAL_ERROR", "Unexpected error while processing the payment");
}

function ignored(reason: string, reference?: string): WebhookOutcome {
  return { status: "ignored", reason, ...(reference ? { reference } : {}) };
}

function failed(reason: string, reference?: string): WebhookOutcome {
  return { status: "failed", reason, ...(reference ? { reference } : {}) };
}

/**
 * Drives a payment from initialization to its provider-confirmed outcome.
 * Both use cases resolve every failure to a result value.
 */
export class PaymentOrchestrator {
  private readonly options: PaymentOrchestratorOptions;

  constructor(
    private readonly stores: PaymentStorePort,
    private readonly gateways: GatewayRegistry,
    private readonly notifier: NotificationSinkPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    options: Partial<PaymentOrchestratorOptions> = {},
  ) {
    this.options = { maxAmount: DEFAULT_MAX_AMOUNT, ...options };
  }

  async initializePayment(input: InitializePaymentInput): Promise<Result<CheckoutSession>> {
    const log = this.logger.child({
      appName: input.appName,
      externalReference: input.externalReference,
      provider: input.provider,
    });
    try {
      return await this.runInitialization(input, log);
    } catch (error) {
      log.error({ err: error }, "Payment initialization failed unexpectedly");
      return toFailure(error);
    }
  }

  async handleWebhook(providerName: string, rawPayload: Buffer, signature: string): Promise<WebhookOutcome> {
    const log = this.logger.child({ provider: providerName });
    try {
      return await this.runWebhook(providerName, rawPayload, signature, log);
    } catch (error) {
      log.error({ err: error }, "Webhook processing failed unexpectedly");
      return failed("internal_error");
    }
  }

  private async runInitialization(input: InitializePaymentInput, log: Logger): Promise<Result<CheckoutSession>> {
    const store = this.stores.open();

    let payment: Payment | null;
    try {
      payment = await store.getByExternalReference(input.appName.trim(), input.externalReference.trim());
    } catch (error) {
      log.error({ err: error }, "Failed to look up existing payment");
      return toFailure(error);
    }

    let created = false;
    if (payment) {
      if (!payment.isPending) {
        log.info({ reference: payment.reference.value, status: payment.status }, "Payment already settled");
        return fail(
          "ALREADY_PROCESSED",
          `Payment for external reference '${payment.externalReference}' has already been processed with status '${payment.status}'.`,
        );
      }
      log.info({ reference: payment.reference.value }, "Retrying initialization of pending payment");
    } else {
      try {
        payment = this.buildPayment(input);
      } catch (error) {
        if (error instanceof DomainError) {
          log.info({ code: error.code }, "Payment request rejected");
          return fail(error.code, error.message);
        }
        throw error;
      }

      try {
        await store.add(payment);
        await store.save();
      } catch (error) {
        log.error({ err: error, reference: payment.reference.value }, "Failed to persist new payment");
        return toFailure(error);
      }
      created = true;
    }

    const paymentLog = log.child({ reference: payment.reference.value });
    // A reused record keeps the provider it was created for.
    const gateway = this.gateways.resolve(payment.provider);
    if (!gateway) {
      if (created) {
        await this.markInitializationFailed(store, payment, paymentLog);
      }
      paymentLog.warn("No gateway registered for provider");
      return fail("UNSUPPORTED_PROVIDER", `Payment provider '${payment.provider}' is not supported`);
    }

    const result = await gateway.initialize(payment);
    if (!result.ok) {
      paymentLog.warn({ code: result.error.code }, "Gateway initialization failed");
      await this.markInitializationFailed(store, payment, paymentLog);
      return result;
    }

    paymentLog.info("Payment initialized");
    return result;
  }

  private async runWebhook(
    providerName: string,
    rawPayload: Buffer,
    signature: string,
    log: Logger,
  ): Promise<WebhookOutcome> {
    const gateway = this.gateways.findByName(providerName);
    if (!gateway) {
      log.warn("Webhook received for unknown provider");
      return failed("unsupported_provider");
    }

    const verification = gateway.verifySignature(rawPayload, signature);
    if (!verification.ok) {
      log.error({ code: verification.error.code }, "Webhook signature could not be verified");
      return failed("signature_verification_error");
    }
    if (!verification.value) {
      log.warn("Webhook signature mismatch");
      return failed("invalid_signature");
    }

    const parsed = gateway.parseWebhook(rawPayload);
    if (!parsed.ok) {
      if (parsed.error.code === GATEWAY_FAILURE.unsupportedEvent) {
        log.info({ detail: parsed.error.message }, "Ignoring webhook event");
        return ignored("unsupported_event");
      }
      log.warn({ detail: parsed.error.message }, "Malformed webhook payload");
      return failed("malformed_payload");
    }

    const rawReference = parsed.value.reference;
    let reference: PaymentReference;
    try {
      reference = PaymentReference.create(rawReference);
    } catch (error) {
      if (error instanceof DomainError) {
        log.info({ reference: rawReference }, "Webhook reference was not issued by this service");
        return ignored("unknown_reference", rawReference);
      }
      throw error;
    }

    const paymentLog = log.child({ reference: reference.value });
    const store = this.stores.open();
    let payment: Payment | null;
    try {
      payment = await store.getByReference(reference);
    } catch (error) {
      paymentLog.error({ err: error }, "Failed to load payment for webhook");
      return failed("lookup_failed", reference.value);
    }
    if (!payment) {
      paymentLog.info("Webhook for unknown payment");
      return ignored("unknown_reference", reference.value);
    }
    if (payment.provider !== gateway.provider) {
      paymentLog.warn({ paymentProvider: payment.provider }, "Webhook provider does not own this payment");
      return ignored("provider_mismatch", reference.value);
    }

    let processing: PaymentProcessingResult;
    try {
      processing = payment.processSuccessfulPayment(parsed.value.amount, this.clock.nowIso());
    } catch (error) {
      if (error instanceof PaymentStateError && error.code === "ALREADY_PROCESSED") {
        paymentLog.info({ status: payment.status }, "Duplicate webhook for settled payment");
        return ignored("already_processed", reference.value);
      }
      throw error;
    }

    try {
      await store.save();
    } catch (error) {
      paymentLog.error({ err: error }, "Failed to persist webhook outcome");
      return failed("persistence_failed", reference.value);
    }

    if (processing === "amount_mismatch") {
      paymentLog.warn(
        { expected: payment.amount.toString(), received: parsed.value.amount.toString() },
        "Webhook amount does not match payment",
      );
      return failed("amount_mismatch", reference.value);
    }

    paymentLog.info("Payment confirmed");
    this.notifier.notify(payment);
    return { status: "processed", reference: reference.value };
  }

  private buildPayment(input: InitializePaymentInput): Payment {
    return Payment.create(
      {
        provider: input.provider,
        purpose: input.purpose,
        amount: Money.create(input.amount, input.currency ?? "NGN", this.options.maxAmount),
        payer: EmailAddress.create(input.externalUserId),
        appName: input.appName,
        externalReference: input.externalReference,
        redirectUrl: CallbackUrl.create(input.redirectUrl),
        notificationUrl: CallbackUrl.create(input.notificationUrl),
      },
      this.clock.nowIso(),
    );
  }

  private async markInitializationFailed(
    store: PaymentStoreSession,
    payment: Payment,
    log: Logger,
  ): Promise<void> {
    payment.markInitializationFailed(this.clock.nowIso());
    try {
      await store.save();
    } catch (error) {
      log.error({ err: error }, "Failed to persist initialization failure");
    }
  }
}
