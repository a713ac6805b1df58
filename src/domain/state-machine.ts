import type { PaymentStatus } from "./types.js";
import { PaymentStateError } from "./errors.js";

const ALLOWED_TRANSITIONS: Record<PaymentStatus, PaymentStatus[]> = {
  pending: ["success", "failed"],
  success: [],
  failed: [],
};

const TERMINAL_STATUSES: Set<PaymentStatus> = new Set(["success", "failed"]);

export function canTransition(current: PaymentStatus, next: PaymentStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function assertTransition(current: PaymentStatus, next: PaymentStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  if (isTerminalStatus(current)) {
    throw new PaymentStateError("ALREADY_PROCESSED", `Payment has already been processed (status '${current}').`);
  }
  throw new PaymentStateError(
    "INVALID_STATE_TRANSITION",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}
