import { DEFAULT_MAX_AMOUNT } from "../domain/money.js";
import { AppError } from "./app-error.js";

export const DEFAULT_API_KEY = "dev_broker_key";
export const DEFAULT_PAYSTACK_SECRET_KEY = "sk_test_dev_placeholder";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(500, "invalid_runtime_config", `Environment variable '${name}' ${expectation}.`);
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const value = (process.env[name] ?? defaultValue).trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim().length === 0) {
    return undefined;
  }
  return parseStringEnv(name, "", minLength);
}

function parseStringListEnv(name: string, minItemLength: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.some((item) => item.length < minItemLength)) {
    throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
  }
  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

function parseUrlEnv(name: string, defaultValue: string): string {
  const value = parseStringEnv(name, defaultValue, 1);
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw invalidConfig(name, "must be an absolute URL");
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw invalidConfig(name, "must use http or https");
  }
  return value;
}

export interface PaystackConfig {
  secretKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface NotificationConfig {
  timeoutMs: number;
  maxAttempts: number;
  signingSecret?: string;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKeys: string[];
  logLevel: LogLevel;
  metricsEnabled: boolean;
  paymentBackend: "memory" | "postgres";
  postgresUrl?: string;
  maxPaymentAmount: number;
  paystack: PaystackConfig;
  notifications: NotificationConfig;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const production = process.env.NODE_ENV === "production";
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("BROKER_API_KEYS", 8);
  const apiKeys = configuredApiKeys ?? [parseStringEnv("BROKER_API_KEY", DEFAULT_API_KEY, 8)];
  const logLevel = parseEnumEnv("BROKER_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("BROKER_METRICS_ENABLED", true);
  const paymentBackend = parseEnumEnv("BROKER_PAYMENT_BACKEND", ["memory", "postgres"] as const, "memory");
  const postgresUrl = parseOptionalStringEnv("BROKER_POSTGRES_URL", 12);
  const maxPaymentAmount = parseIntegerEnv("BROKER_MAX_PAYMENT_AMOUNT", DEFAULT_MAX_AMOUNT, 1, 1_000_000_000_000);
  const paystack: PaystackConfig = {
    secretKey: parseStringEnv("BROKER_PAYSTACK_SECRET_KEY", DEFAULT_PAYSTACK_SECRET_KEY, 8),
    baseUrl: parseUrlEnv("BROKER_PAYSTACK_BASE_URL", "https://api.paystack.co"),
    timeoutMs: parseIntegerEnv("BROKER_PAYSTACK_TIMEOUT_MS", 10000, 100, 120000),
  };
  const signingSecret = parseOptionalStringEnv("BROKER_NOTIFICATION_SIGNING_SECRET", 16);
  const notifications: NotificationConfig = {
    timeoutMs: parseIntegerEnv("BROKER_NOTIFICATION_TIMEOUT_MS", 5000, 100, 120000),
    maxAttempts: parseIntegerEnv("BROKER_NOTIFICATION_MAX_ATTEMPTS", 3, 1, 20),
    ...(signingSecret ? { signingSecret } : {}),
  };

  if (production && apiKeys.includes(DEFAULT_API_KEY)) {
    throw invalidConfig(
      configuredApiKeys ? "BROKER_API_KEYS" : "BROKER_API_KEY",
      "must not include default key value in production",
    );
  }
  if (production && paystack.secretKey === DEFAULT_PAYSTACK_SECRET_KEY) {
    throw invalidConfig("BROKER_PAYSTACK_SECRET_KEY", "must not use default value in production");
  }
  if (paymentBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("BROKER_POSTGRES_URL", "is required when the postgres payment backend is enabled");
  }

  return {
    host,
    port,
    apiKeys,
    logLevel,
    metricsEnabled,
    paymentBackend,
    maxPaymentAmount,
    paystack,
    notifications,
    ...(postgresUrl ? { postgresUrl } : {}),
  };
}
