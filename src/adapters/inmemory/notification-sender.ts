import type {
  NotificationSendInput,
  NotificationSendResult,
  NotificationSenderPort,
} from "../../ports/notification-sender.js";

const TRANSIENT_FAILURE = "transient_notification_error";

/**
 * Records every send. The URL picks the behaviour: `always-fail`, `bad-request`,
 * `rate-limit` (first two attempts) and `flaky` (odd attempts) fail.
 */
export class InMemoryNotificationSender implements NotificationSenderPort {
  private readonly attemptsByUrl = new Map<string, number>();
  private readonly sent: NotificationSendInput[] = [];

  async send(input: NotificationSendInput): Promise<NotificationSendResult> {
    this.sent.push(input);
    const attempt = (this.attemptsByUrl.get(input.url) ?? 0) + 1;
    this.attemptsByUrl.set(input.url, attempt);

    if (input.url.includes("always-fail")) {
      return { ok: false, errorCode: TRANSIENT_FAILURE };
    }
    if (input.url.includes("bad-request")) {
      return { ok: false, statusCode: 400, errorCode: "notification_rejected" };
    }
    if (input.url.includes("rate-limit") && attempt < 3) {
      return { ok: false, statusCode: 429, errorCode: "rate_limited" };
    }
    if (input.url.includes("flaky") && attempt % 2 === 1) {
      return { ok: false, errorCode: TRANSIENT_FAILURE };
    }
    return { ok: true, statusCode: 200 };
  }

  get requests(): readonly NotificationSendInput[] {
    return this.sent;
  }

  attemptsFor(url: string): number {
    return this.attemptsByUrl.get(url) ?? 0;
  }
}
