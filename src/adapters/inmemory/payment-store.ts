import { Payment } from "../../domain/payment.js";
import type { PaymentReference } from "../../domain/payment-reference.js";
import type { PaymentSnapshot } from "../../domain/types.js";
import { DuplicatePaymentError, PersistenceError } from "../../domain/errors.js";
import type { PaymentStorePort, PaymentStoreSession } from "../../ports/payment-store.js";

function externalKey(appName: string, externalReference: string): string {
  return `${appName}\u0000${externalReference}`;
}

class InMemoryPaymentStoreSession implements PaymentStoreSession {
  private readonly tracked = new Map<string, Payment>();

  constructor(private readonly store: InMemoryPaymentStore) {}

  async add(payment: Payment): Promise<void> {
    this.tracked.set(payment.id, payment);
  }

  async getByReference(reference: PaymentReference): Promise<Payment | null> {
    return this.track(this.store.findSnapshot((row) => row.reference === reference.value));
  }

  async getByExternalReference(appName: string, externalReference: string): Promise<Payment | null> {
    const key = externalKey(appName, externalReference);
    return this.track(
      this.store.findSnapshot((row) => externalKey(row.app_name, row.external_reference) === key),
    );
  }

  async save(): Promise<void> {
    this.store.commit([...this.tracked.values()].map((payment) => payment.toSnapshot()));
  }

  private track(snapshot: PaymentSnapshot | undefined): Payment | null {
    if (!snapshot) {
      return null;
    }
    const alreadyTracked = this.tracked.get(snapshot.id);
    if (alreadyTracked) {
      return alreadyTracked;
    }
    const payment = Payment.restore(snapshot);
    this.tracked.set(payment.id, payment);
    return payment;
  }
}

export class InMemoryPaymentStore implements PaymentStorePort {
  private readonly rows = new Map<string, PaymentSnapshot>();

  open(): PaymentStoreSession {
    return new InMemoryPaymentStoreSession(this);
  }

  snapshots(): PaymentSnapshot[] {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  findSnapshot(predicate: (row: PaymentSnapshot) => boolean): PaymentSnapshot | undefined {
    for (const row of this.rows.values()) {
      if (predicate(row)) {
        return { ...row };
      }
    }
    return undefined;
  }

  /** Applies every snapshot or none, enforcing the same unique keys as the SQL schema. */
  commit(snapshots: PaymentSnapshot[]): void {
    const references = new Map<string, string>();
    const externalKeys = new Map<string, string>();
    for (const row of this.rows.values()) {
      references.set(row.reference, row.id);
      externalKeys.set(externalKey(row.app_name, row.external_reference), row.id);
    }

    for (const snapshot of snapshots) {
      const referenceOwner = references.get(snapshot.reference);
      if (referenceOwner && referenceOwner !== snapshot.id) {
        throw new PersistenceError(`Payment reference '${snapshot.reference}' is already in use.`);
      }
      const key = externalKey(snapshot.app_name, snapshot.external_reference);
      const keyOwner = externalKeys.get(key);
      if (keyOwner && keyOwner !== snapshot.id) {
        throw new DuplicatePaymentError(snapshot.app_name, snapshot.external_reference);
      }
      references.set(snapshot.reference, snapshot.id);
      externalKeys.set(key, snapshot.id);
    }

    for (const snapshot of snapshots) {
      this.rows.set(snapshot.id, { ...snapshot });
    }
  }
}
