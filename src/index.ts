export { Account } from './data/account/account';
export type { AccountData } from './data/account/account';
export { Amount, DEFAULT_CURRENCY } from './data/amount/amount';
export {
  DateRange,
  SingleDay,
  RecurringDateRange,
  RecurringDay,
  isDailyInterval,
  compareIntervals,
} from './data/interval/interval';
export type { Interval, DailyInterval } from './data/interval/interval';
export { LinkType, createLink, isLinkTo, serializeLink, deserializeLink } from './data/link/operationLink';
export type { OperationLink, OperationLinkData } from './data/link/operationLink';
export { OperationRange, compareOperationRanges } from './data/operation/operationRange';
export { HistoricOperation } from './data/operation/historicOperation';
export type { HistoricOperationData } from './data/operation/historicOperation';
export { PlannedOperation } from './data/operation/plannedOperation';
export type { PlannedOperationData, PlannedOperationSplitOptions } from './data/operation/plannedOperation';
export { Budget, BUDGET_MATCHER_DEFAULTS } from './data/operation/budget';
export type { BudgetData, BudgetSplitOptions } from './data/operation/budget';
export { linkTypeOf, targetKeyOf, formatTargetKey } from './data/operation/target';
export type { Target, TargetKey } from './data/operation/target';
export type { Category, OperationId, PlannedOperationId, BudgetId, TargetId } from './data/operation/types';

export { formatDate, parseDate, utcDate } from './utils/date/date';
export type { DateString } from './utils/date/types';
export {
  duration,
  days,
  weeks,
  months,
  years,
  ONE_DAY,
  durationEquals,
  formatDuration,
} from './utils/date/duration';
export type { Duration, DurationUnit } from './utils/date/duration';

export {
  OperationMatcher,
  DEFAULT_MATCHER_PARAMS,
  UNBOUNDED_TOLERANCE,
  ratioTolerance,
} from './utils/matching/operationMatcher';
export type { AmountTolerance, MatcherParams } from './utils/matching/operationMatcher';
export { computeMatchScore } from './utils/matching/matchScore';
export { MatcherCache } from './utils/matching/matcherCache';
export type { MatcherEntry } from './utils/matching/matcherCache';
export {
  createHeuristicLinks,
  recalculateLinksForTarget,
  migrateLinksAfterSplit,
  createManualLink,
  nextNonActualizedIteration,
} from './utils/matching/operationLinkService';
export type { LinkRecalculation } from './utils/matching/operationLinkService';
export { categorizeOperations } from './utils/matching/operationsCategorizer';

export { emptyForecast } from './utils/forecast/forecast';
export type { Forecast } from './utils/forecast/forecast';
export { ForecastActualizer, actualizeForecast } from './utils/forecast/forecastActualizer';
export { AccountForecaster } from './utils/forecast/accountForecaster';
export type { BalancePoint } from './utils/forecast/accountForecaster';
export { ReconciliationService } from './utils/forecast/reconciliationService';
export type { CategorizationResult } from './utils/forecast/reconciliationService';

export { loadConfig, loadConfigFromEnvironment, applyLogLevel } from './utils/config/config';
export type { ForecasterConfig } from './utils/config/config';
export { LogLevel, setLogLevel } from './utils/log/logger';
export * from './utils/errors/errors';
export * from './utils/io/records';
export type { ForecastRepository } from './utils/io/repository';
