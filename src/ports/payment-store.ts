import type { Payment } from "../domain/payment.js";
import type { PaymentReference } from "../domain/payment-reference.js";

/**
 * Unit of work over the payment table. Entities returned by the lookups and
 * entities passed to `add` are tracked; `save` commits all of them at once.
 */
export interface PaymentStoreSession {
  add(payment: Payment): Promise<void>;
  getByReference(reference: PaymentReference): Promise<Payment | null>;
  getByExternalReference(appName: string, externalReference: string): Promise<Payment | null>;
  save(): Promise<void>;
}

export interface PaymentStorePort {
  open(): PaymentStoreSession;
  /** Throws when the backing store cannot serve requests. */
  ping?(): Promise<void>;
  close?(): Promise<void>;
}
