import { Amount } from '../amount/amount';
import { Interval, compareIntervals } from '../interval/interval';
import { addDays, daysBetween, isBefore, isAfter, maxDate, minDate, formatDate } from '../../utils/date/date';
import { conservativeDays } from '../../utils/date/duration';
import { InvalidIntervalError } from '../../utils/errors/errors';
import type { Category } from './types';

/**
 * An amount of money assigned to a category over an interval.
 * A negative amount is an expense, a positive amount an income.
 */
export class OperationRange<I extends Interval = Interval> {
  readonly description: string;
  readonly amount: Amount;
  readonly category: Category;
  readonly interval: I;

  constructor(description: string, amount: Amount, category: Category, interval: I) {
    this.description = description;
    this.amount = amount;
    this.category = category;
    this.interval = interval;
  }

  get currency(): string {
    return this.amount.currency;
  }

  /**
   * Amount falling between `startDate` and `endDate`, both included.
   * An iteration only partly covered contributes pro rata of its days.
   */
  amountOnPeriod(startDate: Date, endDate: Date): number {
    if (isAfter(startDate, endDate)) {
      throw new InvalidIntervalError(
        `Period start ${formatDate(startDate)} is after its end ${formatDate(endDate)}`,
      );
    }
    if (this.interval.isExpired(startDate) || this.interval.isFuture(endDate)) {
      return 0;
    }

    // Iterations may overlap the period start even when they began a full duration earlier
    const seekFrom = addDays(startDate, -conservativeDays(this.interval.duration));
    let total = 0;
    for (const iteration of this.interval.iterate(seekFrom)) {
      if (iteration.isExpired(startDate)) {
        continue;
      }
      if (iteration.isFuture(endDate)) {
        break;
      }
      if (!isBefore(iteration.startDate, startDate) && !isAfter(iteration.lastDate, endDate)) {
        total += this.amount.value;
        continue;
      }
      const overlap =
        daysBetween(maxDate(iteration.startDate, startDate), minDate(iteration.lastDate, endDate)) + 1;
      total += (this.amount.value / iteration.totalDays) * overlap;
    }
    return total;
  }

  withDescription(description: string): OperationRange<I> {
    return new OperationRange(description, this.amount, this.category, this.interval);
  }

  withAmount(amount: Amount): OperationRange<I> {
    return new OperationRange(this.description, amount, this.category, this.interval);
  }

  withCategory(category: Category): OperationRange<I> {
    return new OperationRange(this.description, this.amount, category, this.interval);
  }

  withInterval(interval: I): OperationRange<I> {
    return new OperationRange(this.description, this.amount, this.category, interval);
  }

  equals(other: OperationRange): boolean {
    return (
      this.description === other.description &&
      this.amount.equals(other.amount) &&
      this.category === other.category &&
      this.interval.equals(other.interval)
    );
  }

  toString(): string {
    return `${this.interval.toString()} - ${this.category} - ${this.description} - ${this.amount.toString()}`;
  }
}

/**
 * Orders operation ranges by interval start, then interval end.
 */
export function compareOperationRanges(a: OperationRange, b: OperationRange): number {
  return compareIntervals(a.interval, b.interval);
}
