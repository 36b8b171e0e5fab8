import { HistoricOperation } from '../../data/operation/historicOperation';
import { OperationRange } from '../../data/operation/operationRange';
import { daysBetween } from '../date/date';
import { DEFAULT_MATCHER_PARAMS, MatcherParams, matchesDescriptionHints } from './operationMatcher';

const AMOUNT_WEIGHT = 40;
const DATE_WEIGHT = 30;
const CATEGORY_WEIGHT = 20;
const DESCRIPTION_WEIGHT = 10;

/** Days past the date tolerance at which the date score reaches 0. */
const DATE_DECAY_DAYS = 30;

function amountScore(operation: HistoricOperation, range: OperationRange, params: MatcherParams): number {
  const planned = Math.abs(range.amount.value);
  if (planned === 0) {
    return 0;
  }
  const tolerance = params.amountTolerance;
  if (tolerance.kind === 'unbounded') {
    return AMOUNT_WEIGHT;
  }
  const difference = Math.abs(Math.abs(operation.amount.value) - planned) / planned;
  if (difference <= tolerance.ratio) {
    return AMOUNT_WEIGHT;
  }
  return Math.max(0, AMOUNT_WEIGHT * (1 - (difference - tolerance.ratio)));
}

function dateScore(operation: HistoricOperation, iterationDate: Date, params: MatcherParams): number {
  const offset = daysBetween(iterationDate, operation.date);
  const tolerance = offset < 0 ? params.approxBefore : params.approxAfter;
  const distance = Math.abs(offset);
  if (distance <= tolerance) {
    return DATE_WEIGHT;
  }
  return Math.max(0, DATE_WEIGHT * (1 - (distance - tolerance) / DATE_DECAY_DAYS));
}

/**
 * Scores from 0 to 100 how well an operation fits one iteration of a range.
 * Used to pick a target when several matchers accept the same operation.
 *
 * Description points are only awarded when hints are configured.
 */
export function computeMatchScore(
  operation: HistoricOperation,
  range: OperationRange,
  iterationDate: Date,
  params: Partial<MatcherParams> = {},
): number {
  const fullParams: MatcherParams = { ...DEFAULT_MATCHER_PARAMS, ...params };
  let score = amountScore(operation, range, fullParams) + dateScore(operation, iterationDate, fullParams);
  if (operation.category === range.category) {
    score += CATEGORY_WEIGHT;
  }
  if (matchesDescriptionHints(operation.description, fullParams.descriptionHints)) {
    score += DESCRIPTION_WEIGHT;
  }
  return score;
}
