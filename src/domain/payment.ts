import { randomUUID } from "node:crypto";
import { CallbackUrl } from "./callback-url.js";
import { EmailAddress } from "./email-address.js";
import { PaymentStateError } from "./errors.js";
import { Money } from "./money.js";
import { PaymentReference } from "./payment-reference.js";
import { assertTransition, isTerminalStatus } from "./state-machine.js";
import type {
  PaymentProcessingResult,
  PaymentProvider,
  PaymentPurpose,
  PaymentSnapshot,
  PaymentStatus,
} from "./types.js";

export interface NewPaymentProps {
  provider: PaymentProvider;
  purpose: PaymentPurpose;
  amount: Money;
  payer: EmailAddress;
  appName: string;
  externalReference: string;
  redirectUrl: CallbackUrl;
  notificationUrl: CallbackUrl;
}

/**
 * Payment aggregate. State only changes through `processSuccessfulPayment` and
 * `markInitializationFailed`; `verifiedAt` is present exactly when the status
 * is terminal.
 */
export class Payment {
  private constructor(
    readonly id: string,
    readonly reference: PaymentReference,
    readonly provider: PaymentProvider,
    readonly purpose: PaymentPurpose,
    readonly amount: Money,
    readonly payer: EmailAddress,
    readonly appName: string,
    readonly externalReference: string,
    readonly redirectUrl: CallbackUrl,
    readonly notificationUrl: CallbackUrl,
    private currentStatus: PaymentStatus,
    readonly createdAt: string,
    private verifiedAtIso: string | null,
  ) {}

  static create(props: NewPaymentProps, createdAt: string): Payment {
    const appName = props.appName.trim();
    const externalReference = props.externalReference.trim();
    if (appName.length === 0) {
      throw new PaymentStateError("APP_NAME_REQUIRED", "App name is required");
    }
    if (externalReference.length === 0) {
      throw new PaymentStateError("EXTERNAL_REFERENCE_REQUIRED", "External reference is required");
    }

    return new Payment(
      randomUUID(),
      PaymentReference.generate(),
      props.provider,
      props.purpose,
      props.amount,
      props.payer,
      appName,
      externalReference,
      props.redirectUrl,
      props.notificationUrl,
      "pending",
      createdAt,
      null,
    );
  }

  static restore(snapshot: PaymentSnapshot): Payment {
    const terminal = isTerminalStatus(snapshot.status);
    if (terminal !== (snapshot.verified_at !== null)) {
      throw new PaymentStateError(
        "INCONSISTENT_STATE",
        `Payment '${snapshot.reference}' has status '${snapshot.status}' with verified_at ${snapshot.verified_at ?? "null"}.`,
      );
    }

    return new Payment(
      snapshot.id,
      PaymentReference.create(snapshot.reference),
      snapshot.provider,
      snapshot.purpose,
      // Stored amounts were bounded when accepted; the ceiling may have moved since.
      Money.create(snapshot.amount, snapshot.currency, Number.POSITIVE_INFINITY),
      EmailAddress.create(snapshot.payer_email),
      snapshot.app_name,
      snapshot.external_reference,
      CallbackUrl.create(snapshot.redirect_url),
      CallbackUrl.create(snapshot.notification_url),
      snapshot.status,
      snapshot.created_at,
      snapshot.verified_at,
    );
  }

  get status(): PaymentStatus {
    return this.currentStatus;
  }

  get verifiedAt(): string | null {
    return this.verifiedAtIso;
  }

  get isPending(): boolean {
    return this.currentStatus === "pending";
  }

  /**
   * Reconciles a provider-reported charge. Any difference from the stored
   * amount, including currency, fails the payment.
   */
  processSuccessfulPayment(receivedAmount: Money, verifiedAt: string): PaymentProcessingResult {
    if (!this.isPending) {
      throw new PaymentStateError("ALREADY_PROCESSED", `Payment '${this.reference.value}' has already been processed.`);
    }

    if (!receivedAmount.equals(this.amount)) {
      this.transitionTo("failed", verifiedAt);
      return "amount_mismatch";
    }

    this.transitionTo("success", verifiedAt);
    return "success";
  }

  markInitializationFailed(at: string): void {
    if (!this.isPending) {
      return;
    }
    this.transitionTo("failed", at);
  }

  toSnapshot(): PaymentSnapshot {
    return {
      id: this.id,
      reference: this.reference.value,
      provider: this.provider,
      purpose: this.purpose,
      amount: this.amount.amount,
      currency: this.amount.currency,
      payer_email: this.payer.value,
      app_name: this.appName,
      external_reference: this.externalReference,
      redirect_url: this.redirectUrl.value,
      notification_url: this.notificationUrl.value,
      status: this.currentStatus,
      created_at: this.createdAt,
      verified_at: this.verifiedAtIso,
    };
  }

  private transitionTo(next: PaymentStatus, at: string): void {
    assertTransition(this.currentStatus, next);
    this.currentStatus = next;
    this.verifiedAtIso = at;
  }
}
