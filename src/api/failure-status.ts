import type { Failure } from "../domain/result.js";
import { GATEWAY_FAILURE } from "../ports/payment-gateway.js";

const VALIDATION_CODES = new Set([
  "INVALID_AMOUNT",
  "AMOUNT_NOT_POSITIVE",
  "AMOUNT_TOO_LARGE",
  "CURRENCY_REQUIRED",
  "UNSUPPORTED_CURRENCY",
  "CONVERSION_OVERFLOW",
  "EMPTY_EMAIL",
  "INVALID_EMAIL_FORMAT",
  "EMAIL_TOO_LONG",
  "EMPTY_URL",
  "URL_TOO_LONG",
  "INVALID_URL_FORMAT",
  "INVALID_URL_SCHEME",
  "APP_NAME_REQUIRED",
  "EXTERNAL_REFERENCE_REQUIRED",
  "UNSUPPORTED_PROVIDER",
]);

const CONFLICT_CODES = new Set(["ALREADY_PROCESSED", "DUPLICATE_KEY"]);

const GATEWAY_CODES = new Set<string>([
  GATEWAY_FAILURE.network,
  GATEWAY_FAILURE.parse,
  GATEWAY_FAILURE.malformedResponse,
  "PROVIDER_AUTH_ERROR",
  "INVALID_REQUEST",
  "RATE_LIMIT_ERROR",
  "PROVIDER_UNAVAILABLE",
  "PROVIDER_ERROR",
]);

/** HTTP status for a use-case failure; unknown codes are server errors. */
export function statusForFailure(failure: Failure): number {
  if (VALIDATION_CODES.has(failure.code)) {
    return 422;
  }
  if (CONFLICT_CODES.has(failure.code)) {
    return 409;
  }
  if (failure.code === GATEWAY_FAILURE.timeout) {
    return 504;
  }
  if (GATEWAY_CODES.has(failure.code)) {
    return 502;
  }
  return 500;
}
