import { createHash, createHmac } from "node:crypto";

export const NOTIFICATION_TIMESTAMP_HEADER = "X-Broker-Timestamp";
export const NOTIFICATION_SIGNATURE_HEADER = "X-Broker-Signature";
export const NOTIFICATION_KEY_ID_HEADER = "X-Broker-Signature-Key-Id";

export function signNotificationPayload(secret: string, timestamp: string, body: string): string {
  return createHmac("sha256", secret).update(`${timestamp}.${body}`).digest("hex");
}

export function notificationKeyId(secret: string): string {
  return `nk_${createHash("sha256").update(secret).digest("hex").slice(0, 12)}`;
}

/** Headers a receiving application uses to authenticate a notification. */
export function notificationSignatureHeaders(
  secret: string | undefined,
  timestamp: string,
  body: string,
): Record<string, string> {
  if (!secret) {
    return {};
  }
  return {
    [NOTIFICATION_TIMESTAMP_HEADER]: timestamp,
    [NOTIFICATION_SIGNATURE_HEADER]: signNotificationPayload(secret, timestamp, body),
    [NOTIFICATION_KEY_ID_HEADER]: notificationKeyId(secret),
  };
}
