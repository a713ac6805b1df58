import type { Logger } from "pino";
import type { Payment } from "../domain/payment.js";
import type { PaymentNotification } from "../domain/types.js";
import type { ClockPort } from "../infra/clock.js";
import type { NotificationSenderPort } from "../ports/notification-sender.js";
import type { NotificationSinkPort } from "../ports/notification-sink.js";
import { isPermanentNotificationFailure } from "./notification-delivery-policy.js";
import { notificationSignatureHeaders } from "./notification-signing.js";

export type NotificationDeliveryOutcome = "delivered" | "permanent_failure" | "max_attempts_exhausted";

interface AppNotificationDispatcherOptions {
  maxAttempts: number;
  timeoutMs: number;
  signingSecret?: string;
  onOutcome?: (outcome: NotificationDeliveryOutcome) => void;
}

export function toPaymentNotification(payment: Payment): PaymentNotification {
  return {
    paymentReference: payment.reference.value,
    externalReference: payment.externalReference,
    status: payment.status,
    amount: payment.amount.amount,
  };
}

/**
 * Delivers payment outcomes to the notification URL of the originating
 * application. Deliveries run in the background; `drain()` waits for them.
 */
export class AppNotificationDispatcher implements NotificationSinkPort {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly sender: NotificationSenderPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
    private readonly options: AppNotificationDispatcherOptions,
  ) {}

  notify(payment: Payment): void {
    const url = payment.notificationUrl.value;
    const body = JSON.stringify(toPaymentNotification(payment));
    const log = this.logger.child({ reference: payment.reference.value, url });

    const task = this.deliver(url, body, log)
      .then((outcome) => {
        this.options.onOutcome?.(outcome);
      })
      .catch((error: unknown) => {
        log.error({ err: error }, "Unexpected error while notifying app");
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  get inFlight(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async deliver(url: string, body: string, log: Logger): Promise<NotificationDeliveryOutcome> {
    log.info("Sending payment notification");

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt += 1) {
      const timestamp = this.clock.nowIso();
      const result = await this.sender.send({
        url,
        headers: {
          "Content-Type": "application/json",
          ...notificationSignatureHeaders(this.options.signingSecret, timestamp, body),
        },
        body,
        timeoutMs: this.options.timeoutMs,
      });

      if (result.ok) {
        log.info({ attempt }, "Notified app");
        return "delivered";
      }

      log.warn(
        {
          attempt,
          ...(result.statusCode ? { statusCode: result.statusCode } : {}),
          ...(result.errorCode ? { errorCode: result.errorCode } : {}),
        },
        "Failed to notify app",
      );
      if (isPermanentNotificationFailure(result.statusCode)) {
        return "permanent_failure";
      }
    }

    log.error({ attempts: this.options.maxAttempts }, "Giving up on app notification");
    return "max_attempts_exhausted";
  }
}
