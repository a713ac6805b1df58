import { pino, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger } from "pino";

const REDACT_PATHS = ["req.headers.authorization", "headers.authorization", "*.secretKey", "*.signingSecret"];

/** JSON logger on stdout. Silent under Vitest. */
export function makeLogger(level: LogLevel, bindings: Record<string, unknown> = {}): Logger {
  return pino({
    level,
    enabled: process.env.VITEST !== "true",
    base: { ...bindings, service: "payment-broker" },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  });
}

export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
