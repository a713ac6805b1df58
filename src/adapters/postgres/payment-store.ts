import type { Pool, PoolClient } from "pg";
import { Payment } from "../../domain/payment.js";
import type { PaymentReference } from "../../domain/payment-reference.js";
import type { PaymentSnapshot } from "../../domain/types.js";
import { DuplicatePaymentError, PersistenceError } from "../../domain/errors.js";
import type { PaymentStorePort, PaymentStoreSession } from "../../ports/payment-store.js";

const UNIQUE_VIOLATION = "23505";
const EXTERNAL_REFERENCE_CONSTRAINT = "broker_payments_app_external_reference_key";

interface PaymentRow {
  id: string;
  reference: string;
  provider: PaymentSnapshot["provider"];
  purpose: PaymentSnapshot["purpose"];
  amount_minor: unknown;
  currency: PaymentSnapshot["currency"];
  payer_email: string;
  app_name: string;
  external_reference: string;
  redirect_url: string;
  notification_url: string;
  status: PaymentSnapshot["status"];
  created_at: unknown;
  verified_at: unknown;
}

const SELECT_COLUMNS = `
  id,
  reference,
  provider,
  purpose,
  amount_minor,
  currency,
  payer_email,
  app_name,
  external_reference,
  redirect_url,
  notification_url,
  status,
  created_at,
  verified_at
`;

function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

function toMinorUnits(value: unknown): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new PersistenceError("Unable to map numeric field 'amount_minor'.");
  }
  return parsed;
}

function mapRow(row: PaymentRow): Payment {
  return Payment.restore({
    id: row.id,
    reference: row.reference,
    provider: row.provider,
    purpose: row.purpose,
    amount: toMinorUnits(row.amount_minor) / 100,
    currency: row.currency,
    payer_email: row.payer_email,
    app_name: row.app_name,
    external_reference: row.external_reference,
    redirect_url: row.redirect_url,
    notification_url: row.notification_url,
    status: row.status,
    created_at: mapTimestamp(row.created_at),
    verified_at: row.verified_at === null ? null : mapTimestamp(row.verified_at),
  });
}

function pgErrorDetails(error: unknown): { code?: string; constraint?: string } {
  if (typeof error !== "object" || error === null) {
    return {};
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
  const constraint = "constraint" in error && typeof error.constraint === "string" ? error.constraint : undefined;
  return {
    ...(code ? { code } : {}),
    ...(constraint ? { constraint } : {}),
  };
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

class PostgresPaymentStoreSession implements PaymentStoreSession {
  private readonly tracked = new Map<string, Payment>();

  constructor(private readonly pool: Pool) {}

  async add(payment: Payment): Promise<void> {
    this.tracked.set(payment.id, payment);
  }

  async getByReference(reference: PaymentReference): Promise<Payment | null> {
    return this.findOne("reference = $1", [reference.value]);
  }

  async getByExternalReference(appName: string, externalReference: string): Promise<Payment | null> {
    return this.findOne("app_name = $1 AND external_reference = $2", [appName, externalReference]);
  }

  async save(): Promise<void> {
    if (this.tracked.size === 0) {
      return;
    }

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceError("Unable to acquire a database connection.", { cause: error });
    }

    let releaseError: Error | undefined;
    let current: Payment | undefined;
    try {
      await client.query("BEGIN");
      for (const payment of this.tracked.values()) {
        current = payment;
        await this.upsert(client, payment);
      }
      await client.query("COMMIT");
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        releaseError = toError(rollbackError);
      }
      const details = pgErrorDetails(error);
      if (details.code === UNIQUE_VIOLATION && details.constraint === EXTERNAL_REFERENCE_CONSTRAINT && current) {
        throw new DuplicatePaymentError(current.appName, current.externalReference, { cause: error });
      }
      throw new PersistenceError("Failed to save payment changes.", { cause: error });
    } finally {
      client.release(releaseError);
    }
  }

  private async findOne(condition: string, values: string[]): Promise<Payment | null> {
    let rows: PaymentRow[];
    try {
      const result = await this.pool.query<PaymentRow>(
        `
          SELECT ${SELECT_COLUMNS}
          FROM broker_payments
          WHERE ${condition}
          LIMIT 1
        `,
        values,
      );
      rows = result.rows;
    } catch (error) {
      throw new PersistenceError("Failed to load payment.", { cause: error });
    }

    const row = rows[0];
    if (!row) {
      return null;
    }
    const alreadyTracked = this.tracked.get(row.id);
    if (alreadyTracked) {
      return alreadyTracked;
    }

    let payment: Payment;
    try {
      payment = mapRow(row);
    } catch (error) {
      throw new PersistenceError(`Stored payment '${row.id}' could not be mapped.`, { cause: error });
    }
    this.tracked.set(payment.id, payment);
    return payment;
  }

  private async upsert(client: PoolClient, payment: Payment): Promise<void> {
    const snapshot = payment.toSnapshot();
    await client.query(
      `
        INSERT INTO broker_payments (
          id,
          reference,
          provider,
          purpose,
          amount_minor,
          currency,
          payer_email,
          app_name,
          external_reference,
          redirect_url,
          notification_url,
          status,
          created_at,
          verified_at
        )
        VALUES (
          $1::uuid,
          $2,
          $3,
          $4,
          $5::bigint,
          $6,
          $7,
          $8,
          $9,
          $10,
          $11,
          $12,
          $13::timestamptz,
          $14::timestamptz
        )
        ON CONFLICT (id) DO UPDATE
        SET status = EXCLUDED.status,
            verified_at = EXCLUDED.verified_at
      `,
      [
        snapshot.id,
        snapshot.reference,
        snapshot.provider,
        snapshot.purpose,
        payment.amount.toMinorUnit(),
        snapshot.currency,
        snapshot.payer_email,
        snapshot.app_name,
        snapshot.external_reference,
        snapshot.redirect_url,
        snapshot.notification_url,
        snapshot.status,
        snapshot.created_at,
        snapshot.verified_at,
      ],
    );
  }
}

export class PostgresPaymentStore implements PaymentStorePort {
  constructor(private readonly pool: Pool) {}

  open(): PaymentStoreSession {
    return new PostgresPaymentStoreSession(this.pool);
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query("SELECT 1");
    } catch (error) {
      throw new PersistenceError("Payment database is unreachable.", { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
