import { HistoricOperation } from '../../data/operation/historicOperation';
import { OperationRange } from '../../data/operation/operationRange';
import { OperationLink } from '../../data/link/operationLink';
import { DateRange } from '../../data/interval/interval';
import { addDays, formatDate, isAfter, isBeforeOrSame, isSame } from '../date/date';
import { DuplicateLinkError, InvalidIntervalError, InvalidIterationError } from '../errors/errors';
import type { OperationId } from '../../data/operation/types';

/**
 * How far a transaction amount may stray from the planned amount.
 * `unbounded` accepts any amount.
 */
export type AmountTolerance = { kind: 'ratio'; ratio: number } | { kind: 'unbounded' };

export type MatcherParams = {
  /** Substrings looked up case-insensitively in the transaction description. */
  descriptionHints: ReadonlySet<string>;
  /** Days a transaction may precede its iteration. */
  approxBefore: number;
  /** Days a transaction may follow its iteration. */
  approxAfter: number;
  amountTolerance: AmountTolerance;
};

export const DEFAULT_MATCHER_PARAMS: MatcherParams = {
  descriptionHints: new Set<string>(),
  approxBefore: 5,
  approxAfter: 5,
  amountTolerance: { kind: 'ratio', ratio: 0.05 },
};

export function ratioTolerance(ratio: number): AmountTolerance {
  return { kind: 'ratio', ratio };
}

export const UNBOUNDED_TOLERANCE: AmountTolerance = { kind: 'unbounded' };

function validateParams(params: MatcherParams): void {
  if (params.approxBefore < 0 || params.approxAfter < 0) {
    throw new InvalidIntervalError(
      `Date tolerances must not be negative, got ${params.approxBefore}/${params.approxAfter}`,
    );
  }
  if (params.amountTolerance.kind === 'ratio' && !(params.amountTolerance.ratio >= 0)) {
    throw new InvalidIntervalError(`Amount tolerance ratio must not be negative, got ${params.amountTolerance.ratio}`);
  }
}

/**
 * True when the description contains one of the hints, ignoring case.
 */
export function matchesDescriptionHints(description: string, hints: ReadonlySet<string>): boolean {
  const lowered = description.toLowerCase();
  for (const hint of hints) {
    if (lowered.includes(hint.toLowerCase())) {
      return true;
    }
  }
  return false;
}

/**
 * Decides which historic operations belong to an operation range, and to which
 * of its iterations.
 *
 * An operation carrying a link to this range always matches, on the linked
 * iteration. Other operations match on heuristics: same category, amount
 * within tolerance, a description hint when hints are configured, and a date
 * inside an iteration widened by the date tolerances.
 */
export class OperationMatcher {
  readonly operationRange: OperationRange;
  readonly params: MatcherParams;
  private readonly linksByOperation: ReadonlyMap<OperationId, OperationLink>;

  constructor(
    operationRange: OperationRange,
    params: Partial<MatcherParams> = {},
    links: readonly OperationLink[] = [],
  ) {
    this.operationRange = operationRange;
    this.params = { ...DEFAULT_MATCHER_PARAMS, ...params };
    validateParams(this.params);

    const linksByOperation = new Map<OperationId, OperationLink>();
    for (const link of links) {
      this.validateIterationDate(link.iterationDate);
      if (linksByOperation.has(link.operationId)) {
        throw new DuplicateLinkError(link.operationId);
      }
      linksByOperation.set(link.operationId, link);
    }
    this.linksByOperation = linksByOperation;
  }

  get descriptionHints(): ReadonlySet<string> {
    return this.params.descriptionHints;
  }

  get approxBefore(): number {
    return this.params.approxBefore;
  }

  get approxAfter(): number {
    return this.params.approxAfter;
  }

  get amountTolerance(): AmountTolerance {
    return this.params.amountTolerance;
  }

  get links(): readonly OperationLink[] {
    return [...this.linksByOperation.values()];
  }

  private validateIterationDate(iterationDate: Date): void {
    const iteration = this.operationRange.interval.current(iterationDate);
    if (iteration === null || !isSame(iteration.startDate, iterationDate)) {
      throw new InvalidIterationError(
        `Invalid iteration date ${formatDate(iterationDate)} for '${this.operationRange.description}'`,
        formatDate(iterationDate),
      );
    }
  }

  isLinked(operation: HistoricOperation): boolean {
    return this.linksByOperation.has(operation.uniqueId);
  }

  /**
   * Iteration start the operation belongs to: the linked one when a link
   * exists, otherwise the closest iteration reachable within the date
   * tolerances when the operation matches heuristically, otherwise null.
   */
  iterationFor(operation: HistoricOperation): Date | null {
    const link = this.linksByOperation.get(operation.uniqueId);
    if (link) {
      return link.iterationDate;
    }
    if (!this.matchHeuristic(operation)) {
      return null;
    }
    return this.iterationAround(operation.date)?.startDate ?? null;
  }

  private iterationAround(date: Date): DateRange | null {
    return this.operationRange.interval.current(date, this.approxBefore, this.approxAfter);
  }

  matchDescription(operation: HistoricOperation): boolean {
    return matchesDescriptionHints(operation.description, this.descriptionHints);
  }

  matchAmount(operation: HistoricOperation): boolean {
    if (operation.currency !== this.operationRange.currency) {
      return false;
    }
    const tolerance = this.amountTolerance;
    switch (tolerance.kind) {
      case 'unbounded':
        return true;
      case 'ratio': {
        const planned = this.operationRange.amount.value;
        return Math.abs(operation.amount.value - planned) <= Math.abs(planned) * tolerance.ratio;
      }
    }
  }

  matchCategory(operation: HistoricOperation): boolean {
    return operation.category === this.operationRange.category;
  }

  matchDate(operation: HistoricOperation): boolean {
    return this.iterationAround(operation.date) !== null;
  }

  private matchHeuristic(operation: HistoricOperation): boolean {
    return (
      this.matchCategory(operation) &&
      this.matchAmount(operation) &&
      (this.descriptionHints.size === 0 || this.matchDescription(operation)) &&
      this.matchDate(operation)
    );
  }

  /**
   * Links win over heuristics.
   */
  match(operation: HistoricOperation): boolean {
    return this.isLinked(operation) || this.matchHeuristic(operation);
  }

  matches(operations: Iterable<HistoricOperation>): HistoricOperation[] {
    const result: HistoricOperation[] = [];
    for (const operation of operations) {
      if (this.match(operation)) {
        result.push(operation);
      }
    }
    return result;
  }

  private belongsTo(operation: HistoricOperation, iteration: DateRange, approxAfter: number): boolean {
    const link = this.linksByOperation.get(operation.uniqueId);
    if (link) {
      return isSame(link.iterationDate, iteration.startDate);
    }
    return iteration.isWithin(operation.date, this.approxBefore, approxAfter);
  }

  /**
   * Matching operations belonging to the iteration current at `atDate`.
   */
  latestMatchingOperations(atDate: Date, operations: Iterable<HistoricOperation>): HistoricOperation[] {
    const current = this.iterationAround(atDate);
    if (current === null) {
      return [];
    }
    return this.matches(operations).filter((operation) => {
      const iterationDate = this.iterationFor(operation);
      return iterationDate !== null && isSame(iterationDate, current.startDate);
    });
  }

  /**
   * Iterations already due at `atDate`, whose after-tolerance window is still
   * open, and that no matching operation explains. Each operation explains at
   * most one iteration.
   */
  lateDateRanges(atDate: Date, operations: Iterable<HistoricOperation>): DateRange[] {
    const candidates = this.matches(operations);
    const assigned = new Set<OperationId>();
    const late: DateRange[] = [];

    for (const iteration of this.operationRange.interval.iterate(addDays(atDate, -this.approxAfter))) {
      if (iteration.isFuture(atDate)) {
        break;
      }
      if (!iteration.isWithin(atDate, 0, this.approxAfter)) {
        continue;
      }
      const explaining = candidates.find(
        (operation) => !assigned.has(operation.uniqueId) && this.belongsTo(operation, iteration, this.approxAfter),
      );
      if (explaining) {
        assigned.add(explaining.uniqueId);
      } else {
        late.push(iteration);
      }
    }
    return late;
  }

  /**
   * Future iterations already paid: pairs of an iteration starting after
   * `atDate` whose before-tolerance window has opened, and the matching
   * operation made inside that window on or before `atDate`.
   */
  anticipatedDateRanges(atDate: Date, operations: Iterable<HistoricOperation>): [DateRange, HistoricOperation][] {
    const candidates = this.matches(operations).filter((operation) => isBeforeOrSame(operation.date, atDate));
    const assigned = new Set<OperationId>();
    const anticipated: [DateRange, HistoricOperation][] = [];

    for (const iteration of this.operationRange.interval.iterate(atDate)) {
      if (!iteration.isFuture(atDate)) {
        continue;
      }
      if (isAfter(addDays(iteration.startDate, -this.approxBefore), atDate)) {
        break;
      }
      const early = candidates.find(
        (operation) => !assigned.has(operation.uniqueId) && this.belongsTo(operation, iteration, 0),
      );
      if (early) {
        assigned.add(early.uniqueId);
        anticipated.push([iteration, early]);
      }
    }
    return anticipated;
  }

  withParams(params: Partial<MatcherParams>): OperationMatcher {
    return new OperationMatcher(this.operationRange, { ...this.params, ...params }, this.links);
  }

  withLinks(links: readonly OperationLink[]): OperationMatcher {
    return new OperationMatcher(this.operationRange, this.params, links);
  }

  /**
   * Links are tied to the iteration grid of the range, so they only survive
   * when the new range equals the current one.
   */
  withOperationRange(operationRange: OperationRange): OperationMatcher {
    const keepLinks = operationRange.equals(this.operationRange);
    return new OperationMatcher(operationRange, this.params, keepLinks ? this.links : []);
  }
}
