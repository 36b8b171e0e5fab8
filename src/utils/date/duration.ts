import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { InvalidIntervalError } from '../errors/errors';

dayjs.extend(utc);

export type DurationUnit = 'years' | 'months' | 'weeks' | 'days';

/**
 * Calendar-aware length. Years and months step by calendar month (clamping
 * the day to the month end), weeks and days step by whole days.
 */
export type Duration = {
  readonly years: number;
  readonly months: number;
  readonly weeks: number;
  readonly days: number;
};

export type SerializedDuration = {
  value: number;
  unit: DurationUnit;
};

const DURATION_UNITS: readonly DurationUnit[] = ['years', 'months', 'weeks', 'days'];

export function duration(parts: Partial<Duration>): Duration {
  const result: Duration = {
    years: parts.years ?? 0,
    months: parts.months ?? 0,
    weeks: parts.weeks ?? 0,
    days: parts.days ?? 0,
  };
  for (const unit of DURATION_UNITS) {
    const value = result[unit];
    if (!Number.isInteger(value) || value < 0) {
      throw new InvalidIntervalError(`Duration ${unit} must be a non-negative integer, got ${value}`);
    }
  }
  return result;
}

export const ONE_DAY: Duration = duration({ days: 1 });

export function days(n: number): Duration {
  return duration({ days: n });
}

export function weeks(n: number): Duration {
  return duration({ weeks: n });
}

export function months(n: number): Duration {
  return duration({ months: n });
}

export function years(n: number): Duration {
  return duration({ years: n });
}

export function totalMonths(d: Duration): number {
  return d.years * 12 + d.months;
}

export function totalDays(d: Duration): number {
  return d.weeks * 7 + d.days;
}

export function isZeroDuration(d: Duration): boolean {
  return totalMonths(d) === 0 && totalDays(d) === 0;
}

export function durationEquals(a: Duration, b: Duration): boolean {
  return totalMonths(a) === totalMonths(b) && totalDays(a) === totalDays(b);
}

/**
 * `date + times × d`, computed from `date` in one step so that repeated
 * stepping never accumulates month-end truncation.
 */
export function addDuration(date: Date, d: Duration, times: number = 1): Date {
  return dayjs
    .utc(date)
    .add(totalMonths(d) * times, 'month')
    .add(totalDays(d) * times, 'day')
    .toDate();
}

/**
 * Upper bound of the number of days `d` can span, whatever the start date.
 */
export function conservativeDays(d: Duration): number {
  return d.years * 366 + d.months * 31 + d.weeks * 7 + d.days;
}

/**
 * Single (value, unit) pair as stored by persistence.
 * Fields are checked years, months, days, then weeks so weeks never hide days.
 */
export function serializeDuration(d: Duration): SerializedDuration {
  if (totalMonths(d) > 0 && totalDays(d) > 0) {
    throw new InvalidIntervalError(`Cannot store mixed duration ${formatDuration(d)} as a single unit`);
  }
  if (d.years > 0 && d.months === 0) {
    return { value: d.years, unit: 'years' };
  }
  if (totalMonths(d) > 0) {
    return { value: totalMonths(d), unit: 'months' };
  }
  if (d.days > 0) {
    return { value: totalDays(d), unit: 'days' };
  }
  if (d.weeks > 0) {
    return { value: d.weeks, unit: 'weeks' };
  }
  return { value: 0, unit: 'days' };
}

export function deserializeDuration(serialized: SerializedDuration): Duration {
  switch (serialized.unit) {
    case 'years':
      return years(serialized.value);
    case 'months':
      return months(serialized.value);
    case 'weeks':
      return weeks(serialized.value);
    case 'days':
      return days(serialized.value);
  }
}

export function isDurationUnit(value: string): value is DurationUnit {
  return DURATION_UNITS.some((unit) => unit === value);
}

export function formatDuration(d: Duration): string {
  const parts = DURATION_UNITS.filter((unit) => d[unit] !== 0).map((unit) => `${d[unit]} ${unit}`);
  return parts.length > 0 ? parts.join(' ') : '0 days';
}
