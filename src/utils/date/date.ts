import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { InvalidDateError } from '../errors/errors';
import type { DateString } from './types';

dayjs.extend(utc);

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Stands in for "no expiration". Iteration bounds compare against it like any other date.
 */
export const MAX_DATE: Date = new Date(Date.UTC(9999, 11, 31));

export function formatDate(date: Date): DateString {
  return date.toISOString().split('T')[0] as DateString;
}

/**
 * Parses a YYYY-MM-DD string into a UTC midnight date.
 * Rejects strings that do not name a real calendar day (2023-02-30).
 */
export function parseDate(date: string): Date {
  if (!DATE_PATTERN.test(date)) {
    throw new InvalidDateError(date);
  }
  const parsed = dayjs.utc(date);
  if (!parsed.isValid() || parsed.format('YYYY-MM-DD') !== date) {
    throw new InvalidDateError(date);
  }
  return parsed.toDate();
}

/**
 * Builds a UTC midnight date; month is 1-based.
 */
export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Drops the time of day, keeping the UTC calendar day.
 */
export function startOfDay(date: Date): Date {
  return dayjs.utc(date).startOf('day').toDate();
}

export function addDays(date: Date, days: number): Date {
  return dayjs.utc(date).add(days, 'day').toDate();
}

export function addMonths(date: Date, months: number): Date {
  return dayjs.utc(date).add(months, 'month').toDate();
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: Date, to: Date): number {
  return dayjs.utc(to).startOf('day').diff(dayjs.utc(from).startOf('day'), 'day');
}

export function isMaxDate(date: Date): boolean {
  return isSame(date, MAX_DATE);
}

export function isBefore(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isBefore(dayjs.utc(date2), 'day');
}

export function isSame(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isSame(dayjs.utc(date2), 'day');
}

export function isBeforeOrSame(date1: Date, date2: Date): boolean {
  return isBefore(date1, date2) || isSame(date1, date2);
}

export function isAfter(date1: Date, date2: Date): boolean {
  return dayjs.utc(date1).isAfter(dayjs.utc(date2), 'day');
}

export function isAfterOrSame(date1: Date, date2: Date): boolean {
  return isAfter(date1, date2) || isSame(date1, date2);
}

export function minDate(date1: Date, date2: Date): Date {
  return isBefore(date2, date1) ? date2 : date1;
}

export function maxDate(date1: Date, date2: Date): Date {
  return isAfter(date2, date1) ? date2 : date1;
}

/**
 * Comparator for sorting dates ascending at day granularity.
 */
export function compareDates(date1: Date, date2: Date): number {
  return daysBetween(date2, date1);
}
