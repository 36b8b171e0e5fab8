import { Amount } from '../amount/amount';
import { DailyInterval, RecurringDay, isDailyInterval } from '../interval/interval';
import { LinkType, OperationLink, isLinkTo } from '../link/operationLink';
import { OperationRange } from './operationRange';
import { DEFAULT_MATCHER_PARAMS, MatcherParams, OperationMatcher } from '../../utils/matching/operationMatcher';
import { Duration } from '../../utils/date/duration';
import { InvalidIntervalError, NotPeriodicError } from '../../utils/errors/errors';
import type { Category, PlannedOperationId } from './types';

export type PlannedOperationData = {
  id: PlannedOperationId | null;
  description: string;
  amount: Amount;
  category: Category;
  interval: DailyInterval;
  isArchived?: boolean;
  matcherParams?: Partial<MatcherParams>;
  links?: readonly OperationLink[];
};

export type PlannedOperationSplitOptions = {
  amount?: Amount;
  period?: Duration;
};

/**
 * A transaction expected on a given day, once or every period.
 */
export class PlannedOperation extends OperationRange<DailyInterval> {
  readonly id: PlannedOperationId | null;
  readonly isArchived: boolean;
  readonly matcher: OperationMatcher;

  constructor(data: PlannedOperationData) {
    if (!isDailyInterval(data.interval)) {
      throw new InvalidIntervalError(
        `Planned operation '${data.description}' must use a single day or a recurring day`,
      );
    }
    super(data.description, data.amount, data.category, data.interval);
    this.id = data.id;
    this.isArchived = data.isArchived ?? false;
    const id = data.id;
    const ownLinks =
      id === null ? [] : (data.links ?? []).filter((link) => isLinkTo(link, LinkType.PLANNED_OPERATION, id));
    this.matcher = new OperationMatcher(this, { ...DEFAULT_MATCHER_PARAMS, ...data.matcherParams }, ownLinks);
  }

  get matcherParams(): MatcherParams {
    return this.matcher.params;
  }

  get links(): readonly OperationLink[] {
    return this.matcher.links;
  }

  private toData(keepLinks: boolean): PlannedOperationData {
    return {
      id: this.id,
      description: this.description,
      amount: this.amount,
      category: this.category,
      interval: this.interval,
      isArchived: this.isArchived,
      matcherParams: this.matcherParams,
      links: keepLinks ? this.links : [],
    };
  }

  withId(id: PlannedOperationId | null): PlannedOperation {
    return new PlannedOperation({ ...this.toData(id === this.id), id });
  }

  withArchived(isArchived: boolean): PlannedOperation {
    return new PlannedOperation({ ...this.toData(true), isArchived });
  }

  override withDescription(description: string): PlannedOperation {
    return new PlannedOperation({ ...this.toData(false), description });
  }

  override withAmount(amount: Amount): PlannedOperation {
    return new PlannedOperation({ ...this.toData(false), amount });
  }

  override withCategory(category: Category): PlannedOperation {
    return new PlannedOperation({ ...this.toData(false), category });
  }

  override withInterval(interval: DailyInterval): PlannedOperation {
    return new PlannedOperation({ ...this.toData(false), interval });
  }

  withMatcherParams(matcherParams: Partial<MatcherParams>): PlannedOperation {
    return new PlannedOperation({ ...this.toData(true), matcherParams: { ...this.matcherParams, ...matcherParams } });
  }

  withLinks(links: readonly OperationLink[]): PlannedOperation {
    return new PlannedOperation({ ...this.toData(false), links });
  }

  /**
   * Moves the start to `startDate`, keeping the period and expiration of a recurring operation.
   */
  withStartDate(startDate: Date): PlannedOperation {
    return this.withInterval(this.interval.withStartDate(startDate));
  }

  /**
   * Splits a recurring operation so new values apply from `splitDate`.
   * The terminated part keeps the id; the continuation is unsaved and keeps the matcher policy.
   */
  splitAt(splitDate: Date, options: PlannedOperationSplitOptions = {}): [PlannedOperation, PlannedOperation] {
    if (!(this.interval instanceof RecurringDay)) {
      throw new NotPeriodicError(`Cannot split non-periodic planned operation '${this.description}'`);
    }
    const [terminatedInterval, continuationInterval] = this.interval.splitAt(splitDate);

    const terminated = this.withInterval(terminatedInterval);
    const continuation = new PlannedOperation({
      id: null,
      description: this.description,
      amount: options.amount ?? this.amount,
      category: this.category,
      interval: options.period ? continuationInterval.withPeriod(options.period) : continuationInterval,
      matcherParams: this.matcherParams,
    });
    return [terminated, continuation];
  }

  override equals(other: OperationRange): boolean {
    return (
      other instanceof PlannedOperation &&
      other.id === this.id &&
      other.isArchived === this.isArchived &&
      super.equals(other)
    );
  }
}
