import { InvalidAmountError } from './errors.js';

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

/**
 * Currency-agnostic amount held as integer cents.
 * Negative values are allowed for balances; `parse` only accepts positive input.
 */
export class Money {
  private constructor(public readonly cents: number) {}

  static fromCents(cents: number): Money {
    if (!Number.isSafeInteger(cents)) {
      throw new InvalidAmountError('Amount is out of range.');
    }
    return new Money(cents);
  }

  static zero(): Money {
    return new Money(0);
  }

  /**
   * Parse user input such as "50", "50.2" or "50.25" into a strictly positive
   * amount. At most two fractional digits are accepted.
   */
  static parse(input: string): Money {
    const match = DECIMAL_PATTERN.exec(input.trim());
    if (!match) {
      throw new InvalidAmountError('Amount must be a number.');
    }

    const [, sign, whole, fraction = ''] = match;
    if (fraction.length > 2) {
      throw new InvalidAmountError('Amount can have at most two decimal places.');
    }

    const cents = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
    if (!Number.isSafeInteger(cents)) {
      throw new InvalidAmountError('Amount is out of range.');
    }
    if (sign === '-' || cents <= 0) {
      throw new InvalidAmountError();
    }
    return new Money(cents);
  }

  add(other: Money): Money {
    return Money.fromCents(this.cents + other.cents);
  }

  subtract(other: Money): Money {
    return Money.fromCents(this.cents - other.cents);
  }

  equals(other: Money): boolean {
    return this.cents === other.cents;
  }

  /** Two-decimal rendering, e.g. 100025 → "1000.25", -5 → "-0.05". */
  toString(): string {
    const abs = Math.abs(this.cents);
    const whole = Math.floor(abs / 100);
    const fraction = String(abs % 100).padStart(2, '0');
    return `${this.cents < 0 ? '-' : ''}${whole}.${fraction}`;
  }
}
