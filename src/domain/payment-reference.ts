import { randomUUID } from "node:crypto";
import { InvalidPaymentReferenceError } from "./errors.js";

const PREFIX = "PB_";
const REFERENCE_PATTERN = /^PB_[a-f0-9]{32}$/i;

/**
 * Internal payment reference, `PB_` followed by 32 hex characters. Sent to the
 * provider and echoed back in its webhooks, so it doubles as the correlation key.
 */
export class PaymentReference {
  private constructor(readonly value: string) {}

  static generate(): PaymentReference {
    return new PaymentReference(`${PREFIX}${randomUUID().replace(/-/g, "")}`);
  }

  static create(raw: string): PaymentReference {
    if (raw.trim().length === 0) {
      throw new InvalidPaymentReferenceError("EMPTY_REFERENCE", "Payment reference cannot be empty");
    }
    if (!raw.toUpperCase().startsWith(PREFIX)) {
      throw new InvalidPaymentReferenceError("INVALID_PREFIX", `Payment reference must start with '${PREFIX}'`);
    }
    if (!REFERENCE_PATTERN.test(raw)) {
      throw new InvalidPaymentReferenceError("INVALID_FORMAT", "Payment reference format is invalid");
    }
    return new PaymentReference(raw.toLowerCase().replace(/^pb_/, PREFIX));
  }

  equals(other: PaymentReference): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
