import { Amount, DEFAULT_CURRENCY } from '../../data/amount/amount';
import {
  DailyInterval,
  DateRange,
  Interval,
  RecurringDateRange,
  RecurringDay,
  SingleDay,
} from '../../data/interval/interval';
import { OperationLink } from '../../data/link/operationLink';
import { Budget, BUDGET_MATCHER_DEFAULTS } from '../../data/operation/budget';
import { HistoricOperation } from '../../data/operation/historicOperation';
import { PlannedOperation } from '../../data/operation/plannedOperation';
import type { BudgetId, Category, OperationId, PlannedOperationId } from '../../data/operation/types';
import { formatDate, parseDate } from '../date/date';
import { Duration, ONE_DAY, deserializeDuration, isDurationUnit, serializeDuration } from '../date/duration';
import { InvalidRecordError } from '../errors/errors';
import type { ForecasterConfig } from '../config/config';
import { DEFAULT_MATCHER_PARAMS, MatcherParams, UNBOUNDED_TOLERANCE, ratioTolerance } from '../matching/operationMatcher';

/**
 * Flat shape of an interval as stored in a table row. Units are kept as plain
 * strings since they come back from storage unchecked.
 */
export type IntervalRecord = {
  startDate: string;
  durationValue: number | null;
  durationUnit: string | null;
  periodValue: number | null;
  periodUnit: string | null;
  endDate: string | null;
};

export type MatcherRecord = {
  descriptionHints: string[];
  approxBefore: number;
  approxAfter: number;
  /** Null for an unbounded tolerance. */
  amountRatio: number | null;
};

export type HistoricOperationRecord = {
  uniqueId: OperationId;
  description: string;
  amount: number;
  currency: string | null;
  category: Category;
  date: string;
};

export type PlannedOperationRecord = {
  id: PlannedOperationId | null;
  description: string;
  amount: number;
  currency: string | null;
  category: Category;
  isArchived: boolean;
  interval: IntervalRecord;
  matcher: MatcherRecord | null;
};

export type BudgetRecord = {
  id: BudgetId | null;
  description: string;
  amount: number;
  currency: string | null;
  category: Category;
  interval: IntervalRecord;
};

export type RecordDefaults = Pick<ForecasterConfig, 'defaultCurrency' | 'plannedOperationMatcher' | 'budgetMatcher'>;

export const DEFAULT_RECORD_DEFAULTS: RecordDefaults = {
  defaultCurrency: DEFAULT_CURRENCY,
  plannedOperationMatcher: DEFAULT_MATCHER_PARAMS,
  budgetMatcher: BUDGET_MATCHER_DEFAULTS,
};

function readDate(value: string, field: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidRecordError(`${field} must be a YYYY-MM-DD date, got '${value}'`, field);
  }
  return parseDate(value);
}

/**
 * Both parts present gives a duration, both absent gives null, anything else is corrupt.
 */
function readDuration(value: number | null, unit: string | null, field: string): Duration | null {
  if (value === null && unit === null) {
    return null;
  }
  if (value === null || unit === null) {
    throw new InvalidRecordError(`${field} needs both a value and a unit`, field);
  }
  if (!isDurationUnit(unit)) {
    throw new InvalidRecordError(`Unknown ${field} unit '${unit}'`, field);
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidRecordError(`${field} must be a positive whole number, got ${value}`, field);
  }
  return deserializeDuration({ value, unit });
}

export function serializeInterval(interval: Interval): IntervalRecord {
  switch (interval.kind) {
    case 'single': {
      const stored = serializeDuration(interval.duration);
      return {
        startDate: formatDate(interval.startDate),
        durationValue: stored.value,
        durationUnit: stored.unit,
        periodValue: null,
        periodUnit: null,
        endDate: null,
      };
    }
    case 'recurring': {
      const storedDuration = serializeDuration(interval.duration);
      const storedPeriod = serializeDuration(interval.period);
      const expiration = interval.expirationDate;
      return {
        startDate: formatDate(interval.startDate),
        durationValue: storedDuration.value,
        durationUnit: storedDuration.unit,
        periodValue: storedPeriod.value,
        periodUnit: storedPeriod.unit,
        endDate: expiration === null ? null : formatDate(expiration),
      };
    }
  }
}

/**
 * A missing duration reads as one day; a missing end date as no expiration.
 */
export function deserializeInterval(record: IntervalRecord): Interval {
  const startDate = readDate(record.startDate, 'startDate');
  const base = new DateRange(
    startDate,
    readDuration(record.durationValue, record.durationUnit, 'duration') ?? ONE_DAY,
  );
  const period = readDuration(record.periodValue, record.periodUnit, 'period');
  if (period === null) {
    return base;
  }
  const endDate = record.endDate === null ? null : readDate(record.endDate, 'endDate');
  return new RecurringDateRange(base, period, endDate);
}

/**
 * Planned operations only take day-long intervals, so any stored duration is ignored.
 */
export function deserializePlannedInterval(record: IntervalRecord): DailyInterval {
  const startDate = readDate(record.startDate, 'startDate');
  const period = readDuration(record.periodValue, record.periodUnit, 'period');
  if (period === null) {
    return new SingleDay(startDate);
  }
  const endDate = record.endDate === null ? null : readDate(record.endDate, 'endDate');
  return new RecurringDay(startDate, period, endDate);
}

export function serializeMatcherParams(params: MatcherParams): MatcherRecord {
  return {
    descriptionHints: [...params.descriptionHints].sort(),
    approxBefore: params.approxBefore,
    approxAfter: params.approxAfter,
    amountRatio: params.amountTolerance.kind === 'ratio' ? params.amountTolerance.ratio : null,
  };
}

export function deserializeMatcherParams(record: MatcherRecord): MatcherParams {
  return {
    descriptionHints: new Set(record.descriptionHints),
    approxBefore: record.approxBefore,
    approxAfter: record.approxAfter,
    amountTolerance: record.amountRatio === null ? UNBOUNDED_TOLERANCE : ratioTolerance(record.amountRatio),
  };
}

export function serializeHistoricOperation(operation: HistoricOperation): HistoricOperationRecord {
  return {
    uniqueId: operation.uniqueId,
    description: operation.description,
    amount: operation.amount.value,
    currency: operation.currency,
    category: operation.category,
    date: formatDate(operation.date),
  };
}

export function deserializeHistoricOperation(
  record: HistoricOperationRecord,
  defaults: RecordDefaults = DEFAULT_RECORD_DEFAULTS,
): HistoricOperation {
  return new HistoricOperation({
    uniqueId: record.uniqueId,
    description: record.description,
    amount: new Amount(record.amount, record.currency ?? defaults.defaultCurrency),
    category: record.category,
    date: readDate(record.date, 'date'),
  });
}

export function serializePlannedOperation(plannedOperation: PlannedOperation): PlannedOperationRecord {
  return {
    id: plannedOperation.id,
    description: plannedOperation.description,
    amount: plannedOperation.amount.value,
    currency: plannedOperation.currency,
    category: plannedOperation.category,
    isArchived: plannedOperation.isArchived,
    interval: serializeInterval(plannedOperation.interval),
    matcher: serializeMatcherParams(plannedOperation.matcherParams),
  };
}

/**
 * Links of other targets are ignored. A row without matcher settings takes the configured defaults.
 */
export function deserializePlannedOperation(
  record: PlannedOperationRecord,
  links: readonly OperationLink[] = [],
  defaults: RecordDefaults = DEFAULT_RECORD_DEFAULTS,
): PlannedOperation {
  return new PlannedOperation({
    id: record.id,
    description: record.description,
    amount: new Amount(record.amount, record.currency ?? defaults.defaultCurrency),
    category: record.category,
    interval: deserializePlannedInterval(record.interval),
    isArchived: record.isArchived,
    matcherParams: record.matcher === null ? defaults.plannedOperationMatcher : deserializeMatcherParams(record.matcher),
    links,
  });
}

export function serializeBudget(budget: Budget): BudgetRecord {
  return {
    id: budget.id,
    description: budget.description,
    amount: budget.amount.value,
    currency: budget.currency,
    category: budget.category,
    interval: serializeInterval(budget.interval),
  };
}

export function deserializeBudget(
  record: BudgetRecord,
  links: readonly OperationLink[] = [],
  defaults: RecordDefaults = DEFAULT_RECORD_DEFAULTS,
): Budget {
  return new Budget({
    id: record.id,
    description: record.description,
    amount: new Amount(record.amount, record.currency ?? defaults.defaultCurrency),
    category: record.category,
    interval: deserializeInterval(record.interval),
    matcherParams: defaults.budgetMatcher,
    links,
  });
}
