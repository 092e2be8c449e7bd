import { CurrencyMismatchError } from "../errors/index.js";
import { formatMinorUnits, parseMinorUnits } from "../utils/amounts.js";

/**
 * Amount plus currency. Stored as integer hundredths so equality is exact.
 * Two values only compare equal within the same currency.
 */
export class Money {
  readonly minor: number;
  readonly currency: string;

  private constructor(minor: number, currency: string) {
    this.minor = minor;
    this.currency = currency;
    Object.freeze(this);
  }

  static fromMinor(minor: number, currency: string): Money {
    if (!Number.isInteger(minor)) {
      throw new RangeError(`Minor units must be an integer, got ${minor}`);
    }
    // -0 would print as "0.00" but fail Object.is checks in callers
    return new Money(minor === 0 ? 0 : minor, currency.toUpperCase());
  }

  static zero(currency: string): Money {
    return Money.fromMinor(0, currency);
  }

  /**
   * Returns null when the amount cannot be read.
   */
  static parse(amount: string | number, currency: string): Money | null {
    const minor = parseMinorUnits(amount);
    return minor === null ? null : Money.fromMinor(minor, currency);
  }

  get isNegative(): boolean {
    return this.minor < 0;
  }

  sameCurrency(other: Money): boolean {
    return this.currency === other.currency;
  }

  equals(other: Money): boolean {
    return this.sameCurrency(other) && this.minor === other.minor;
  }

  plus(other: Money): Money {
    if (!this.sameCurrency(other)) {
      throw new CurrencyMismatchError(this.toString(), other.toString());
    }
    return Money.fromMinor(this.minor + other.minor, this.currency);
  }

  negate(): Money {
    return Money.fromMinor(-this.minor, this.currency);
  }

  abs(): Money {
    return Money.fromMinor(Math.abs(this.minor), this.currency);
  }

  /** Integer division, rounded half away from zero. */
  divide(parts: number): Money {
    if (!Number.isInteger(parts) || parts <= 0) {
      throw new RangeError(`Cannot divide by ${parts}`);
    }
    const share = Math.sign(this.minor) * Math.round(Math.abs(this.minor) / parts);
    return Money.fromMinor(share, this.currency);
  }

  /** "15.00" */
  toDecimalString(): string {
    return formatMinorUnits(this.minor);
  }

  /** "EUR 15.00" */
  toString(): string {
    return `${this.currency} ${this.toDecimalString()}`;
  }

  toJSON(): { amount: string; currency: string } {
    return { amount: this.toDecimalString(), currency: this.currency };
  }
}
