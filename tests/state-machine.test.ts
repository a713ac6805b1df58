import { describe, expect, it } from "vitest";
import { PaymentStateError } from "../src/domain/errors.js";
import { assertTransition, canTransition, isTerminalStatus } from "../src/domain/state-machine.js";
import type { PaymentStatus } from "../src/domain/types.js";

function transitionErrorCode(current: PaymentStatus, next: PaymentStatus): string | undefined {
  try {
    assertTransition(current, next);
  } catch (error) {
    return error instanceof PaymentStateError ? error.code : "unexpected";
  }
  return undefined;
}

describe("Payment state machine", () => {
  it("allows pending payments to settle either way", () => {
    expect(canTransition("pending", "success")).toBe(true);
    expect(canTransition("pending", "failed")).toBe(true);
    expect(transitionErrorCode("pending", "success")).toBeUndefined();
  });

  it("blocks every transition out of a terminal status", () => {
    expect(canTransition("success", "failed")).toBe(false);
    expect(canTransition("failed", "success")).toBe(false);
    expect(canTransition("success", "pending")).toBe(false);
    expect(transitionErrorCode("success", "failed")).toBe("ALREADY_PROCESSED");
    expect(transitionErrorCode("failed", "success")).toBe("ALREADY_PROCESSED");
  });

  it("reports a pending self-transition as invalid", () => {
    expect(transitionErrorCode("pending", "pending")).toBe("INVALID_STATE_TRANSITION");
  });

  it("marks terminal statuses", () => {
    expect(isTerminalStatus("success")).toBe(true);
    expect(isTerminalStatus("failed")).toBe(true);
    expect(isTerminalStatus("pending")).toBe(false);
  });
});
