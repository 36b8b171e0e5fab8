import { Target, TargetKey, formatTargetKey, targetKeyOf } from '../../data/operation/target';
import { LinkType } from '../../data/link/operationLink';
import { debug } from '../log/logger';
import type { Forecast } from '../forecast/forecast';
import { OperationMatcher } from './operationMatcher';

export type MatcherEntry = {
  readonly key: TargetKey;
  readonly matcher: OperationMatcher;
};

/**
 * Matchers of every stored target, keyed by link type and target id.
 * Owned by the caller and updated explicitly as targets change.
 */
export class MatcherCache {
  private readonly matchers = new Map<string, MatcherEntry>();

  static fromForecast(forecast: Forecast): MatcherCache {
    const cache = new MatcherCache();
    for (const target of [...forecast.operations, ...forecast.budgets]) {
      cache.insert(target);
    }
    debug('Built matcher cache', {
      plannedOperations: cache.entries().filter((entry) => entry.key.targetType === LinkType.PLANNED_OPERATION).length,
      budgets: cache.entries().filter((entry) => entry.key.targetType === LinkType.BUDGET).length,
    });
    return cache;
  }

  get size(): number {
    return this.matchers.size;
  }

  /**
   * Adds or replaces the matcher of a target. Targets without an id are ignored.
   */
  insert(target: Target): boolean {
    const key = targetKeyOf(target);
    if (key === null) {
      return false;
    }
    this.matchers.set(formatTargetKey(key), { key, matcher: target.matcher });
    return true;
  }

  remove(key: TargetKey): boolean {
    return this.matchers.delete(formatTargetKey(key));
  }

  get(key: TargetKey): OperationMatcher | undefined {
    return this.matchers.get(formatTargetKey(key))?.matcher;
  }

  entries(): MatcherEntry[] {
    return [...this.matchers.values()];
  }
}
