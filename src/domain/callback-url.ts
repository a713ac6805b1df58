import { InvalidUrlError } from "./errors.js";

const MAX_URL_LENGTH = 500;
const ALLOWED_PROTOCOLS = new Set(["http:", "https:"]);

function parseAbsoluteUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

/** Absolute http(s) URL a caller application asked us to redirect or post to. */
export class CallbackUrl {
  private constructor(readonly value: string) {}

  static create(raw: string): CallbackUrl {
    const value = raw.trim();
    if (value.length === 0) {
      throw new InvalidUrlError("EMPTY_URL", "URL cannot be empty");
    }
    if (value.length > MAX_URL_LENGTH) {
      throw new InvalidUrlError("URL_TOO_LONG", `URL cannot exceed ${MAX_URL_LENGTH} characters`);
    }
    const parsed = parseAbsoluteUrl(value);
    if (!parsed) {
      throw new InvalidUrlError("INVALID_URL_FORMAT", "URL format is invalid");
    }
    if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
      throw new InvalidUrlError("INVALID_URL_SCHEME", "URL must use HTTP or HTTPS scheme");
    }
    return new CallbackUrl(value);
  }

  equals(other: CallbackUrl): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
