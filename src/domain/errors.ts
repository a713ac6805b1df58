import { AppError } from "../infra/app-error.js";

/**
 * Business-rule violation raised while building value objects or mutating a
 * payment. Always recoverable at the use-case boundary.
 */
export class DomainError extends AppError {
  constructor(code: string, message: string) {
    super(422, code, message);
  }
}

export class InvalidMoneyError extends DomainError {}

export class InvalidEmailError extends DomainError {}

export class InvalidUrlError extends DomainError {}

export class InvalidPaymentReferenceError extends DomainError {}

export class PaymentStateError extends DomainError {}

export class PersistenceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(500, "DATABASE_ERROR", message, options);
  }
}

export class DuplicatePaymentError extends AppError {
  constructor(appName: string, externalReference: string, options?: { cause?: unknown }) {
    super(
      409,
      "DUPLICATE_KEY",
      `A payment for '${appName}' with external reference '${externalReference}' already exists.`,
      options,
    );
  }
}
