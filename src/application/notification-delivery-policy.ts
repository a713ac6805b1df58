const RETRYABLE_CLIENT_STATUSES = new Set([408, 425, 429]);

/**
 * A receiving application that answers with a 4xx will answer the same way
 * again, apart from timeouts and throttling.
 */
export function isPermanentNotificationFailure(statusCode: number | undefined): boolean {
  if (statusCode === undefined || RETRYABLE_CLIENT_STATUSES.has(statusCode)) {
    return false;
  }
  return statusCode >= 400 && statusCode < 500;
}
