import { InvalidMoneyError } from "./errors.js";
import { isCurrencyCode, type CurrencyCode } from "./types.js";

export const DEFAULT_MAX_AMOUNT = 100_000_000;

const MINOR_UNITS_PER_MAJOR = 100;

const CURRENCY_SYMBOLS: Record<CurrencyCode, string> = {
  NGN: "₦",
  USD: "$",
  GBP: "£",
  EUR: "€",
};

const CENT_CURRENCIES: ReadonlySet<CurrencyCode> = new Set(["USD", "GBP", "EUR"]);

const amountFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

// Half away from zero. The epsilon nudge keeps values such as 1.005 from
// landing just under the midpoint after binary scaling.
function roundToMinorUnits(amount: number): number {
  const scaled = Math.round(Math.abs(amount) * MINOR_UNITS_PER_MAJOR * (1 + Number.EPSILON));
  return amount < 0 ? -scaled : scaled;
}

/**
 * Positive monetary amount with two-place precision in one of the supported
 * currencies. Held internally as integer minor units.
 */
export class Money {
  private constructor(
    private readonly minorUnits: number,
    readonly currency: CurrencyCode,
    private readonly maxAmount: number,
  ) {}

  static create(amount: number, currency = "NGN", maxAmount = DEFAULT_MAX_AMOUNT): Money {
    if (!Number.isFinite(amount)) {
      throw new InvalidMoneyError("INVALID_AMOUNT", "Amount must be a finite number");
    }
    const minorUnits = roundToMinorUnits(amount);
    if (minorUnits <= 0) {
      throw new InvalidMoneyError("AMOUNT_NOT_POSITIVE", "Amount must be greater than zero");
    }
    if (minorUnits > maxAmount * MINOR_UNITS_PER_MAJOR) {
      throw new InvalidMoneyError("AMOUNT_TOO_LARGE", "Amount exceeds maximum allowed value");
    }
    if (currency.trim().length === 0) {
      throw new InvalidMoneyError("CURRENCY_REQUIRED", "Currency is required");
    }
    const normalizedCurrency = currency.trim().toUpperCase();
    if (!isCurrencyCode(normalizedCurrency)) {
      throw new InvalidMoneyError("UNSUPPORTED_CURRENCY", `Currency '${currency}' is not supported`);
    }
    return new Money(minorUnits, normalizedCurrency, maxAmount);
  }

  /** Builds a value from a provider's minor-unit amount (kobo, cents). */
  static fromMinorUnit(minorUnits: number, currency = "NGN", maxAmount = DEFAULT_MAX_AMOUNT): Money {
    if (!Number.isSafeInteger(minorUnits)) {
      throw new InvalidMoneyError("INVALID_AMOUNT", "Minor-unit amount must be an integer");
    }
    return Money.create(minorUnits / MINOR_UNITS_PER_MAJOR, currency, maxAmount);
  }

  get amount(): number {
    return this.minorUnits / MINOR_UNITS_PER_MAJOR;
  }

  toMinorUnit(decimals = 2): number {
    const result = decimals >= 2
      ? this.minorUnits * 10 ** (decimals - 2)
      : Math.trunc(this.minorUnits / 10 ** (2 - decimals));
    if (!Number.isSafeInteger(result)) {
      throw new InvalidMoneyError("CONVERSION_OVERFLOW", "Amount too large to convert to minor units");
    }
    return result;
  }

  toKobo(): number {
    if (this.currency !== "NGN") {
      throw new InvalidMoneyError("INVALID_CURRENCY_CONVERSION", "toKobo is only valid for NGN");
    }
    return this.toMinorUnit(2);
  }

  toCents(): number {
    if (!CENT_CURRENCIES.has(this.currency)) {
      throw new InvalidMoneyError("INVALID_CURRENCY_CONVERSION", "toCents is only valid for USD, GBP or EUR");
    }
    return this.toMinorUnit(2);
  }

  add(other: Money): Money {
    this.assertSameCurrency(other, "add");
    return Money.create((this.minorUnits + other.minorUnits) / MINOR_UNITS_PER_MAJOR, this.currency, this.maxAmount);
  }

  subtract(other: Money): Money {
    this.assertSameCurrency(other, "subtract");
    const remainder = this.minorUnits - other.minorUnits;
    if (remainder <= 0) {
      throw new InvalidMoneyError("NEGATIVE_RESULT", "Cannot subtract to zero or negative amount");
    }
    return Money.create(remainder / MINOR_UNITS_PER_MAJOR, this.currency, this.maxAmount);
  }

  multiplyBy(factor: number): Money {
    if (!(factor > 0) || !Number.isFinite(factor)) {
      throw new InvalidMoneyError("INVALID_FACTOR", "Cannot multiply by zero or negative factor");
    }
    return Money.create(this.amount * factor, this.currency, this.maxAmount);
  }

  greaterThan(other: Money): boolean {
    this.assertSameCurrency(other, "compare");
    return this.minorUnits > other.minorUnits;
  }

  lessThan(other: Money): boolean {
    this.assertSameCurrency(other, "compare");
    return this.minorUnits < other.minorUnits;
  }

  equals(other: Money): boolean {
    return this.currency === other.currency && this.minorUnits === other.minorUnits;
  }

  format(): string {
    return `${CURRENCY_SYMBOLS[this.currency]}${amountFormatter.format(this.amount)}`;
  }

  toString(): string {
    return `${this.currency} ${this.amount.toFixed(2)}`;
  }

  private assertSameCurrency(other: Money, operation: string): void {
    if (this.currency !== other.currency) {
      throw new InvalidMoneyError(
        "CURRENCY_MISMATCH",
        `Cannot ${operation} money with different currencies (${this.currency}, ${other.currency})`,
      );
    }
  }
}
