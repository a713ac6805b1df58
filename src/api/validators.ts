import {
  isPaymentProvider,
  isPaymentPurpose,
  PAYMENT_PROVIDERS,
  PAYMENT_PURPOSES,
  type InitializePaymentInput,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

const APP_NAME_PATTERN = /^[a-zA-Z0-9\s\-_.]+$/;
const MAX_APP_NAME_LENGTH = 100;
const MAX_EXTERNAL_REFERENCE_LENGTH = 200;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function invalid(code: string, message: string): AppError {
  return new AppError(422, code, message);
}

function requireString(payload: Record<string, unknown>, field: string, code: string): string {
  const value = payload[field];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw invalid(code, `${field} is required.`);
  }
  return value;
}

function hasAtMostTwoDecimals(amount: number): boolean {
  const scaled = amount * 100;
  return Math.abs(scaled - Math.round(scaled)) < 1e-6;
}

/**
 * Shape checks for the initialize request. Value rules (email format, URL
 * scheme, amount ceiling) belong to the domain value objects.
 */
export function parseInitializePaymentInput(payload: unknown): InitializePaymentInput {
  if (!isObject(payload)) {
    throw new AppError(400, "INVALID_REQUEST_BODY", "Request body must be an object.");
  }

  const externalUserId = requireString(payload, "externalUserId", "EXTERNAL_USER_ID_REQUIRED");

  const { amount, currency } = payload;
  if (typeof amount !== "number" || !Number.isFinite(amount)) {
    throw invalid("INVALID_AMOUNT", "amount must be a number.");
  }
  if (!hasAtMostTwoDecimals(amount)) {
    throw invalid("INVALID_AMOUNT_PRECISION", "amount can have at most 2 decimal places.");
  }
  if (currency !== undefined && typeof currency !== "string") {
    throw invalid("UNSUPPORTED_CURRENCY", "currency must be a string.");
  }

  const purpose = typeof payload.purpose === "string" ? payload.purpose.trim().toLowerCase() : "";
  if (!isPaymentPurpose(purpose)) {
    throw invalid("INVALID_PURPOSE", `purpose must be one of: ${PAYMENT_PURPOSES.join(", ")}.`);
  }
  const provider = typeof payload.provider === "string" ? payload.provider.trim().toLowerCase() : "";
  if (!isPaymentProvider(provider)) {
    throw invalid("INVALID_PROVIDER", `provider must be one of: ${PAYMENT_PROVIDERS.join(", ")}.`);
  }

  const appName = requireString(payload, "appName", "APP_NAME_REQUIRED").trim();
  if (appName.length > MAX_APP_NAME_LENGTH) {
    throw invalid("APP_NAME_TOO_LONG", `appName must be at most ${MAX_APP_NAME_LENGTH} characters.`);
  }
  if (!APP_NAME_PATTERN.test(appName)) {
    throw invalid(
      "INVALID_APP_NAME",
      "appName can only contain letters, numbers, spaces, hyphens, underscores, and periods.",
    );
  }

  const externalReference = requireString(payload, "externalReference", "EXTERNAL_REFERENCE_REQUIRED").trim();
  if (externalReference.length > MAX_EXTERNAL_REFERENCE_LENGTH) {
    throw invalid(
      "EXTERNAL_REFERENCE_TOO_LONG",
      `externalReference must be at most ${MAX_EXTERNAL_REFERENCE_LENGTH} characters.`,
    );
  }

  return {
    externalUserId,
    amount,
    purpose,
    provider,
    appName,
    externalReference,
    redirectUrl: requireString(payload, "redirectUrl", "EMPTY_URL"),
    notificationUrl: requireString(payload, "notificationUrl", "EMPTY_URL"),
    ...(currency !== undefined ? { currency } : {}),
  };
}
