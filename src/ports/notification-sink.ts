import type { Payment } from "../domain/payment.js";

export interface NotificationSinkPort {
  /** Schedules delivery; returns before the caller application is reached and never throws. */
  notify(payment: Payment): void;
}
