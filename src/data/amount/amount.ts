import { CurrencyMismatchError } from '../../utils/errors/errors';

export const DEFAULT_CURRENCY = 'EUR';

/**
 * A signed value of money tagged with its currency.
 * Arithmetic between two amounts requires the same currency.
 */
export class Amount {
  readonly value: number;
  readonly currency: string;

  constructor(value: number, currency: string = DEFAULT_CURRENCY) {
    this.value = value;
    this.currency = currency;
  }

  private assertSameCurrency(other: Amount): void {
    if (this.currency !== other.currency) {
      throw new CurrencyMismatchError(this.currency, other.currency);
    }
  }

  add(other: Amount): Amount {
    this.assertSameCurrency(other);
    return new Amount(this.value + other.value, this.currency);
  }

  subtract(other: Amount): Amount {
    this.assertSameCurrency(other);
    return new Amount(this.value - other.value, this.currency);
  }

  negate(): Amount {
    return new Amount(-this.value, this.currency);
  }

  multiply(scalar: number): Amount {
    return new Amount(this.value * scalar, this.currency);
  }

  abs(): Amount {
    return new Amount(Math.abs(this.value), this.currency);
  }

  equals(other: Amount): boolean {
    return this.value === other.value && this.currency === other.currency;
  }

  /**
   * Rounds to cents for display only; arithmetic keeps full precision.
   */
  toString(): string {
    return `${this.value.toFixed(2)} ${this.currency}`;
  }
}
