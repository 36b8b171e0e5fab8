import { Amount } from '../amount/amount';
import { Interval, RecurringDateRange } from '../interval/interval';
import { LinkType, OperationLink, isLinkTo } from '../link/operationLink';
import { OperationRange } from './operationRange';
import { MatcherParams, OperationMatcher, UNBOUNDED_TOLERANCE } from '../../utils/matching/operationMatcher';
import { Duration } from '../../utils/date/duration';
import { NotPeriodicError } from '../../utils/errors/errors';
import type { BudgetId, Category } from './types';

/**
 * Budgets only take transactions dated inside their own interval, whatever the amount.
 */
export const BUDGET_MATCHER_DEFAULTS: MatcherParams = {
  descriptionHints: new Set<string>(),
  approxBefore: 0,
  approxAfter: 0,
  amountTolerance: UNBOUNDED_TOLERANCE,
};

export type BudgetData = {
  id: BudgetId | null;
  description: string;
  amount: Amount;
  category: Category;
  interval: Interval;
  matcherParams?: Partial<MatcherParams>;
  links?: readonly OperationLink[];
};

export type BudgetSplitOptions = {
  amount?: Amount;
  period?: Duration;
  duration?: Duration;
};

/**
 * A spending envelope for a category, one-off or renewed every period.
 */
export class Budget extends OperationRange<Interval> {
  readonly id: BudgetId | null;
  readonly matcher: OperationMatcher;

  /**
   * Links not aimed at this budget are ignored, so the full link set can be passed.
   */
  constructor(data: BudgetData) {
    super(data.description, data.amount, data.category, data.interval);
    this.id = data.id;
    const id = data.id;
    const ownLinks = id === null ? [] : (data.links ?? []).filter((link) => isLinkTo(link, LinkType.BUDGET, id));
    this.matcher = new OperationMatcher(this, { ...BUDGET_MATCHER_DEFAULTS, ...data.matcherParams }, ownLinks);
  }

  get matcherParams(): MatcherParams {
    return this.matcher.params;
  }

  get links(): readonly OperationLink[] {
    return this.matcher.links;
  }

  private toData(keepLinks: boolean): BudgetData {
    return {
      id: this.id,
      description: this.description,
      amount: this.amount,
      category: this.category,
      interval: this.interval,
      matcherParams: this.matcherParams,
      links: keepLinks ? this.links : [],
    };
  }

  withId(id: BudgetId | null): Budget {
    return new Budget({ ...this.toData(id === this.id), id });
  }

  override withDescription(description: string): Budget {
    return new Budget({ ...this.toData(false), description });
  }

  override withAmount(amount: Amount): Budget {
    return new Budget({ ...this.toData(false), amount });
  }

  override withCategory(category: Category): Budget {
    return new Budget({ ...this.toData(false), category });
  }

  override withInterval(interval: Interval): Budget {
    return new Budget({ ...this.toData(false), interval });
  }

  withMatcherParams(matcherParams: Partial<MatcherParams>): Budget {
    return new Budget({ ...this.toData(true), matcherParams: { ...this.matcherParams, ...matcherParams } });
  }

  withLinks(links: readonly OperationLink[]): Budget {
    return new Budget({ ...this.toData(false), links });
  }

  /**
   * Splits a recurring budget so new values apply from `splitDate`.
   * The terminated part keeps the id; the continuation is unsaved and keeps the matcher policy.
   */
  splitAt(splitDate: Date, options: BudgetSplitOptions = {}): [Budget, Budget] {
    if (this.interval.kind !== 'recurring') {
      throw new NotPeriodicError(`Cannot split non-periodic budget '${this.description}'`);
    }
    const [terminatedInterval, continuationInterval] = this.interval.splitAt(splitDate);

    let interval: RecurringDateRange = continuationInterval;
    if (options.period) {
      interval = interval.withPeriod(options.period);
    }
    if (options.duration) {
      interval = interval.withDuration(options.duration);
    }

    const terminated = this.withInterval(terminatedInterval);
    const continuation = new Budget({
      id: null,
      description: this.description,
      amount: options.amount ?? this.amount,
      category: this.category,
      interval,
      matcherParams: this.matcherParams,
    });
    return [terminated, continuation];
  }

  override equals(other: OperationRange): boolean {
    return other instanceof Budget && other.id === this.id && super.equals(other);
  }
}
