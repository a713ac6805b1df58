import type {
  NotificationSendInput,
  NotificationSendResult,
  NotificationSenderPort,
} from "../../ports/notification-sender.js";
import { globalFetch, isTimeoutError, type FetchLike } from "./fetch.js";

export class HttpNotificationSender implements NotificationSenderPort {
  constructor(private readonly fetchImpl: FetchLike = globalFetch) {}

  async send(input: NotificationSendInput): Promise<NotificationSendResult> {
    let statusCode: number;
    try {
      const response = await this.fetchImpl(input.url, {
        method: "POST",
        headers: input.headers,
        body: input.body,
        signal: AbortSignal.timeout(input.timeoutMs),
      });
      statusCode = response.status;
      // Read the body so the connection returns to the pool.
      await response.arrayBuffer();
    } catch (error) {
      return { ok: false, errorCode: isTimeoutError(error) ? "timeout" : "network_error" };
    }

    if (statusCode >= 200 && statusCode < 300) {
      return { ok: true, statusCode };
    }
    return { ok: false, statusCode, errorCode: `http_${statusCode}` };
  }
}
