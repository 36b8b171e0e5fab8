import { describe, it, expect } from 'vitest';
import {
  DateRange,
  RecurringDateRange,
  RecurringDay,
  SingleDay,
  compareIntervals,
  isDailyInterval,
} from './interval';
import { addDays, formatDate, isBefore, parseDate } from '../../utils/date/date';
import { days, duration, months, weeks, years } from '../../utils/date/duration';
import { InvalidIntervalError, InvalidSplitError } from '../../utils/errors/errors';

const d = parseDate;

function starts(ranges: Iterable<DateRange>, count: number): string[] {
  const result: string[] = [];
  for (const range of ranges) {
    if (result.length === count) {
      break;
    }
    result.push(formatDate(range.startDate));
  }
  return result;
}

describe('DateRange', () => {
  const range = new DateRange(d('2025-01-10'), days(5));

  it('should end the day before start plus duration', () => {
    expect(formatDate(range.lastDate)).toBe('2025-01-14');
    expect(range.totalDays).toBe(5);
  });

  it('should cover calendar months', () => {
    const february = new DateRange(d('2024-02-01'), months(1));

    expect(formatDate(february.lastDate)).toBe('2024-02-29');
    expect(february.totalDays).toBe(29);
  });

  it('should reject an empty duration', () => {
    expect(() => new DateRange(d('2025-01-01'), duration({}))).toThrow(InvalidIntervalError);
  });

  it('should tell expired, future and within apart', () => {
    expect(range.isExpired(d('2025-01-15'))).toBe(true);
    expect(range.isExpired(d('2025-01-14'))).toBe(false);
    expect(range.isFuture(d('2025-01-09'))).toBe(true);
    expect(range.isWithin(d('2025-01-12'))).toBe(true);
    expect(range.isWithin(d('2025-01-08'))).toBe(false);
    expect(range.isWithin(d('2025-01-08'), 2)).toBe(true);
    expect(range.isWithin(d('2025-01-16'), 0, 2)).toBe(true);
  });

  it('should be its own single iteration', () => {
    expect([...range.iterate()]).toEqual([range]);
    expect(range.current(d('2025-01-20'))).toBeNull();
    expect(range.current(d('2025-01-20'), 0, 6)).toBe(range);
    expect(range.next(d('2025-01-01'))).toBe(range);
    expect(range.next(d('2025-01-10'))).toBeNull();
    expect(range.last(d('2025-02-01'))).toBe(range);
    expect(range.last(d('2025-01-01'))).toBeNull();
  });

  it('should compare by start and length', () => {
    expect(range.equals(new DateRange(d('2025-01-10'), days(5)))).toBe(true);
    expect(new DateRange(d('2025-02-01'), months(1)).equals(new DateRange(d('2025-02-01'), weeks(4)))).toBe(true);
    expect(range.equals(range.withDuration(days(6)))).toBe(false);
  });

  it('should keep the subtype when moving a single day', () => {
    const day = new SingleDay(d('2025-01-01')).withStartDate(d('2025-02-01'));

    expect(day).toBeInstanceOf(SingleDay);
    expect(day.daily).toBe(true);
    expect(formatDate(day.lastDate)).toBe('2025-02-01');
  });
});

describe('RecurringDateRange', () => {
  const monthly = new RecurringDateRange(new DateRange(d('2025-01-01'), months(1)), months(1));

  it('should reject an empty period', () => {
    expect(() => new RecurringDateRange(new SingleDay(d('2025-01-01')), duration({}))).toThrow(InvalidIntervalError);
  });

  it('should report no expiration when unbounded', () => {
    expect(monthly.expirationDate).toBeNull();
    expect(formatDate(monthly.lastDate)).toBe('9999-12-31');
  });

  it('should step from the initial date without drifting', () => {
    const endOfMonth = new RecurringDay(d('2025-10-31'), months(1));

    expect(starts(endOfMonth.iterate(), 6)).toEqual([
      '2025-10-31',
      '2025-11-30',
      '2025-12-31',
      '2026-01-31',
      '2026-02-28',
      '2026-03-31',
    ]);
  });

  it('should keep February 29 on leap years only', () => {
    const yearly = new RecurringDay(d('2024-02-29'), years(1));

    expect(starts(yearly.iterate(), 5)).toEqual(['2024-02-29', '2025-02-28', '2026-02-28', '2027-02-28', '2028-02-29']);
  });

  it('should stop at the expiration date', () => {
    const bounded = new RecurringDateRange(new DateRange(d('2025-01-01'), days(10)), months(1), d('2025-03-05'));

    expect(starts(bounded.iterate(), 10)).toEqual(['2025-01-01', '2025-02-01']);
  });

  it('should include an iteration ending on the expiration date', () => {
    const bounded = new RecurringDay(d('2025-01-01'), months(1), d('2025-03-01'));

    expect(starts(bounded.iterate(), 10)).toEqual(['2025-01-01', '2025-02-01', '2025-03-01']);
  });

  describe('iterate from a date', () => {
    it('should start on the iteration in progress', () => {
      expect(starts(monthly.iterate(d('2025-03-15')), 2)).toEqual(['2025-03-01', '2025-04-01']);
    });

    it('should start one iteration early when the date opens an iteration', () => {
      expect(starts(monthly.iterate(d('2025-03-01')), 2)).toEqual(['2025-02-01', '2025-03-01']);
    });

    it('should start from the beginning for earlier dates', () => {
      expect(starts(monthly.iterate(d('2024-06-01')), 1)).toEqual(['2025-01-01']);
    });

    const periods = [
      ['months', months(1)],
      ['years', years(1)],
      ['days', days(3)],
      ['weeks', weeks(2)],
      ['months and days', duration({ months: 1, days: 5 })],
      ['quarters', months(3)],
    ] as const;

    it.each(periods)('should never skip an iteration when stepping by %s', (_name, period) => {
      const recurring = new RecurringDay(d('2020-01-31'), period);
      for (const from of ['2020-03-01', '2023-07-15', '2031-12-31', '2045-02-28']) {
        const fromDate = d(from);
        let expected: string | null = null;
        for (const iteration of recurring.iterate()) {
          if (!isBefore(iteration.startDate, fromDate)) {
            expected = formatDate(iteration.startDate);
            break;
          }
        }
        const seeked = starts(recurring.iterate(fromDate), 2);
        expect(isBefore(d(seeked[0]), fromDate)).toBe(true);
        expect(seeked[1]).toBe(expected);
      }
    });
  });

  describe('single lookups', () => {
    it('should find the iteration containing a date', () => {
      expect(monthly.current(d('2025-02-14'))?.toString()).toBe('2025-02-01 - 2025-02-28');
    });

    it('should widen the current lookup with tolerances', () => {
      const weekly = new RecurringDay(d('2025-01-01'), weeks(1));

      expect(weekly.current(d('2025-01-03'))).toBeNull();
      expect(formatDate(weekly.current(d('2025-01-03'), 0, 2)?.startDate ?? d('2000-01-01'))).toBe('2025-01-01');
      expect(formatDate(weekly.current(d('2025-01-06'), 2)?.startDate ?? d('2000-01-01'))).toBe('2025-01-08');
    });

    it('should find the next iteration strictly after a date', () => {
      expect(formatDate(monthly.next(d('2025-01-20'))?.startDate ?? d('2000-01-01'))).toBe('2025-02-01');
      expect(formatDate(monthly.next(d('2025-02-01'))?.startDate ?? d('2000-01-01'))).toBe('2025-03-01');
    });

    it('should have no next iteration once expired', () => {
      const bounded = new RecurringDay(d('2025-01-01'), months(1), d('2025-02-01'));

      expect(bounded.next(d('2025-02-01'))).toBeNull();
    });

    it('should find the latest iteration started by a date', () => {
      const weekly = new RecurringDay(d('2025-01-01'), weeks(1));

      expect(formatDate(weekly.last(d('2025-01-10'))?.startDate ?? d('2000-01-01'))).toBe('2025-01-08');
      expect(weekly.last(d('2024-12-31'))).toBeNull();
    });
  });

  describe('splitAt', () => {
    it('should end the day before the first iteration on or after the split date', () => {
      const [terminated, continuation] = monthly.splitAt(d('2025-03-10'));

      expect(formatDate(terminated.lastDate)).toBe('2025-03-31');
      expect(formatDate(continuation.startDate)).toBe('2025-04-01');
      expect(continuation.expirationDate).toBeNull();
    });

    it('should partition the iterations', () => {
      const recurring = new RecurringDay(d('2025-01-15'), weeks(2), d('2025-06-30'));
      const [terminated, continuation] = recurring.splitAt(d('2025-03-01'));

      expect(formatDate(addDays(terminated.lastDate, 1))).toBe(formatDate(continuation.startDate));
      expect([...starts(terminated.iterate(), 100), ...starts(continuation.iterate(), 100)]).toEqual(
        starts(recurring.iterate(), 100),
      );
      expect(continuation).toBeInstanceOf(RecurringDay);
    });

    it('should refuse a date on or before the first iteration', () => {
      expect(() => monthly.splitAt(d('2025-01-01'))).toThrow(InvalidSplitError);
    });

    it('should refuse a date after the last iteration', () => {
      const bounded = new RecurringDay(d('2025-01-01'), months(1), d('2025-03-01'));

      expect(() => bounded.splitAt(d('2025-03-02'))).toThrow('No iteration found at or after 2025-03-02');
    });
  });

  it('should compare base, period and expiration', () => {
    expect(monthly.equals(new RecurringDateRange(new DateRange(d('2025-01-01'), months(1)), months(1)))).toBe(true);
    expect(monthly.equals(monthly.withPeriod(months(2)))).toBe(false);
    expect(monthly.equals(monthly.withExpirationDate(d('2025-12-31')))).toBe(false);
  });

  it('should describe itself', () => {
    expect(new RecurringDay(d('2025-01-01'), months(1)).toString()).toBe(
      '2025-01-01 - 2025-01-01 every 1 months until forever',
    );
  });
});

describe('interval helpers', () => {
  it('should only accept single days and recurring days as daily intervals', () => {
    expect(isDailyInterval(new SingleDay(d('2025-01-01')))).toBe(true);
    expect(isDailyInterval(new RecurringDay(d('2025-01-01'), months(1)))).toBe(true);
    expect(isDailyInterval(new DateRange(d('2025-01-01'), days(1)))).toBe(false);
  });

  it('should order by start then end', () => {
    const short = new DateRange(d('2025-01-01'), days(2));
    const long = new DateRange(d('2025-01-01'), days(5));
    const later = new SingleDay(d('2024-12-01'));

    expect([long, short, later].sort(compareIntervals)).toEqual([later, short, long]);
  });
});
