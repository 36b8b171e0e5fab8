import {
  MAX_DATE,
  addDays,
  daysBetween,
  formatDate,
  isAfter,
  isBefore,
  isBeforeOrSame,
  isMaxDate,
  isSame,
} from '../../utils/date/date';
import {
  Duration,
  ONE_DAY,
  addDuration,
  conservativeDays,
  durationEquals,
  formatDuration,
  isZeroDuration,
} from '../../utils/date/duration';
import { InvalidIntervalError, InvalidSplitError } from '../../utils/errors/errors';

/**
 * A contiguous run of calendar days: a start date plus a calendar-aware duration.
 * `lastDate` is `startDate + duration - 1 day`.
 */
export class DateRange {
  readonly kind = 'single' as const;
  readonly daily: boolean = false;

  private readonly _startDate: Date;
  private readonly _duration: Duration;

  constructor(startDate: Date, duration: Duration) {
    if (isZeroDuration(duration)) {
      throw new InvalidIntervalError('A date range must last at least one day');
    }
    this._startDate = startDate;
    this._duration = duration;
  }

  get startDate(): Date {
    return this._startDate;
  }

  get lastDate(): Date {
    return addDays(addDuration(this._startDate, this._duration), -1);
  }

  get duration(): Duration {
    return this._duration;
  }

  /**
   * Number of calendar days covered, both ends included.
   */
  get totalDays(): number {
    return daysBetween(this.startDate, this.lastDate) + 1;
  }

  isExpired(target: Date): boolean {
    return isBefore(this.lastDate, target);
  }

  isFuture(target: Date): boolean {
    return isAfter(this.startDate, target);
  }

  isWithin(target: Date, approxBefore: number = 0, approxAfter: number = 0): boolean {
    return (
      isBeforeOrSame(addDays(this.startDate, -approxBefore), target) &&
      isBeforeOrSame(target, addDays(this.lastDate, approxAfter))
    );
  }

  /**
   * A single range is its own only iteration.
   */
  *iterate(_fromDate?: Date): Generator<DateRange> {
    yield this;
  }

  current(target: Date, approxBefore: number = 0, approxAfter: number = 0): DateRange | null {
    return this.isWithin(target, approxBefore, approxAfter) ? this : null;
  }

  next(target: Date): DateRange | null {
    return this.isFuture(target) ? this : null;
  }

  last(target: Date): DateRange | null {
    return this.isFuture(target) ? null : this;
  }

  withStartDate(startDate: Date): DateRange {
    return new DateRange(startDate, this._duration);
  }

  withDuration(duration: Duration): DateRange {
    return new DateRange(this._startDate, duration);
  }

  equals(other: Interval): boolean {
    return other instanceof DateRange && isSame(this.startDate, other.startDate) && this.totalDays === other.totalDays;
  }

  toString(): string {
    return `${formatDate(this.startDate)} - ${formatDate(this.lastDate)}`;
  }
}

export class SingleDay extends DateRange {
  override readonly daily: true = true;

  constructor(startDate: Date) {
    super(startDate, ONE_DAY);
  }

  override withStartDate(startDate: Date): SingleDay {
    return new SingleDay(startDate);
  }
}

/**
 * A base range repeated every `period`, bounded by an optional expiration date.
 *
 * Iteration `n` starts at `startDate + n × period`, always computed from the
 * initial start so month-end clamping never accumulates. Only iterations whose
 * last day falls on or before the expiration are produced.
 */
export class RecurringDateRange {
  readonly kind = 'recurring' as const;
  readonly daily: boolean = false;

  protected readonly base: DateRange;
  private readonly _period: Duration;
  private readonly _expirationDate: Date;

  constructor(base: DateRange, period: Duration, expirationDate: Date | null = null) {
    if (isZeroDuration(period)) {
      throw new InvalidIntervalError('A recurring period must be longer than zero days');
    }
    this.base = base;
    this._period = period;
    this._expirationDate = expirationDate ?? MAX_DATE;
  }

  get startDate(): Date {
    return this.base.startDate;
  }

  /**
   * The expiration date, or the far-future sentinel when unbounded.
   */
  get lastDate(): Date {
    return this._expirationDate;
  }

  get expirationDate(): Date | null {
    return isMaxDate(this._expirationDate) ? null : this._expirationDate;
  }

  get baseDateRange(): DateRange {
    return this.base;
  }

  /**
   * Duration of a single iteration.
   */
  get duration(): Duration {
    return this.base.duration;
  }

  get period(): Duration {
    return this._period;
  }

  get totalDays(): number {
    return daysBetween(this.startDate, this.lastDate) + 1;
  }

  isExpired(target: Date): boolean {
    return isBefore(this._expirationDate, target);
  }

  isFuture(target: Date): boolean {
    return this.base.isFuture(target);
  }

  isWithin(target: Date, approxBefore: number = 0, approxAfter: number = 0): boolean {
    return this.current(target, approxBefore, approxAfter) !== null;
  }

  iterationAt(index: number): DateRange {
    return this.base.withStartDate(addDuration(this.startDate, this._period, index));
  }

  /**
   * Lazily yields iterations in ascending order. With `fromDate`, starts at the
   * last iteration beginning before it (or the first one at or after it) without
   * walking from the beginning: the start index is estimated with the longest
   * possible length of each period unit, which can only land early, then walked
   * forward.
   */
  *iterate(fromDate?: Date): Generator<DateRange> {
    let index = 0;
    if (fromDate !== undefined && isAfter(fromDate, this.startDate)) {
      const elapsed = daysBetween(this.startDate, fromDate);
      index = Math.max(0, Math.floor(elapsed / conservativeDays(this._period)) - 1);
      while (isBefore(addDuration(this.startDate, this._period, index + 1), fromDate)) {
        index += 1;
      }
    }
    for (; ; index += 1) {
      const iteration = this.iterationAt(index);
      if (isAfter(iteration.lastDate, this._expirationDate)) {
        return;
      }
      yield iteration;
    }
  }

  current(target: Date, approxBefore: number = 0, approxAfter: number = 0): DateRange | null {
    for (const iteration of this.iterate(target)) {
      if (iteration.isWithin(target, approxBefore, approxAfter)) {
        return iteration;
      }
      if (iteration.isFuture(target)) {
        break;
      }
    }
    return null;
  }

  next(target: Date): DateRange | null {
    for (const iteration of this.iterate(target)) {
      if (iteration.isFuture(target)) {
        return iteration;
      }
    }
    return null;
  }

  /**
   * The iteration containing `target`, else the latest one that started before it.
   */
  last(target: Date): DateRange | null {
    let previous: DateRange | null = null;
    for (const iteration of this.iterate(target)) {
      if (iteration.isWithin(target)) {
        return iteration;
      }
      if (iteration.isFuture(target)) {
        return previous;
      }
      previous = iteration;
    }
    return previous;
  }

  /**
   * Start of the first iteration on or after `splitDate`.
   */
  protected splitPoint(splitDate: Date): Date {
    if (!isAfter(splitDate, this.startDate)) {
      throw new InvalidSplitError(
        `Split date ${formatDate(splitDate)} must be after the first iteration ${formatDate(this.startDate)}`,
      );
    }
    for (const iteration of this.iterate(splitDate)) {
      if (!isBefore(iteration.startDate, splitDate)) {
        return iteration.startDate;
      }
    }
    throw new InvalidSplitError(`No iteration found at or after ${formatDate(splitDate)}`);
  }

  /**
   * Returns `[terminated, continuation]`: the first ends the day before the
   * first iteration on or after `splitDate`, the second starts on it and keeps
   * the original expiration.
   */
  splitAt(splitDate: Date): [RecurringDateRange, RecurringDateRange] {
    const start = this.splitPoint(splitDate);
    return [this.withExpirationDate(addDays(start, -1)), this.withStartDate(start)];
  }

  withStartDate(startDate: Date): RecurringDateRange {
    return new RecurringDateRange(this.base.withStartDate(startDate), this._period, this.expirationDate);
  }

  withDuration(duration: Duration): RecurringDateRange {
    return new RecurringDateRange(this.base.withDuration(duration), this._period, this.expirationDate);
  }

  withPeriod(period: Duration): RecurringDateRange {
    return new RecurringDateRange(this.base, period, this.expirationDate);
  }

  withExpirationDate(expirationDate: Date | null): RecurringDateRange {
    return new RecurringDateRange(this.base, this._period, expirationDate);
  }

  equals(other: Interval): boolean {
    return (
      other instanceof RecurringDateRange &&
      this.base.equals(other.base) &&
      durationEquals(this._period, other._period) &&
      isSame(this._expirationDate, other._expirationDate)
    );
  }

  toString(): string {
    const until = this.expirationDate ? formatDate(this.expirationDate) : 'forever';
    return `${this.base.toString()} every ${formatDuration(this._period)} until ${until}`;
  }
}

export class RecurringDay extends RecurringDateRange {
  override readonly daily: true = true;

  constructor(startDate: Date, period: Duration, expirationDate: Date | null = null) {
    super(new SingleDay(startDate), period, expirationDate);
  }

  override splitAt(splitDate: Date): [RecurringDay, RecurringDay] {
    const start = this.splitPoint(splitDate);
    return [this.withExpirationDate(addDays(start, -1)), this.withStartDate(start)];
  }

  override withStartDate(startDate: Date): RecurringDay {
    return new RecurringDay(startDate, this.period, this.expirationDate);
  }

  override withPeriod(period: Duration): RecurringDay {
    return new RecurringDay(this.startDate, period, this.expirationDate);
  }

  override withExpirationDate(expirationDate: Date | null): RecurringDay {
    return new RecurringDay(this.startDate, this.period, expirationDate);
  }
}

/**
 * Either a single calendar span or a recurring one. Switch on `kind`.
 */
export type Interval = DateRange | RecurringDateRange;

/**
 * The shapes a planned operation may take: one day, or one day repeated.
 */
export type DailyInterval = SingleDay | RecurringDay;

export function isDailyInterval(interval: Interval): interval is DailyInterval {
  return interval instanceof SingleDay || interval instanceof RecurringDay;
}

/**
 * Orders intervals by start date, then last date.
 */
export function compareIntervals(a: Interval, b: Interval): number {
  const byStart = daysBetween(b.startDate, a.startDate);
  if (byStart !== 0) {
    return byStart;
  }
  return daysBetween(b.lastDate, a.lastDate);
}
