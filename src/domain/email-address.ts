import { InvalidEmailError } from "./errors.js";

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/i;
const MAX_EMAIL_LENGTH = 254;

export class EmailAddress {
  private constructor(readonly value: string) {}

  static create(raw: string): EmailAddress {
    if (raw.trim().length === 0) {
      throw new InvalidEmailError("EMPTY_EMAIL", "Email address cannot be empty");
    }
    const normalized = raw.trim().toLowerCase();
    if (!EMAIL_PATTERN.test(normalized)) {
      throw new InvalidEmailError("INVALID_EMAIL_FORMAT", "Email address format is invalid");
    }
    if (normalized.length > MAX_EMAIL_LENGTH) {
      throw new InvalidEmailError("EMAIL_TOO_LONG", "Email address is too long");
    }
    return new EmailAddress(normalized);
  }

  equals(other: EmailAddress): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
