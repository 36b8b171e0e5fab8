import { Account } from '../../data/account/account';
import { DateRange } from '../../data/interval/interval';
import { LinkType, OperationLink, isLinkTo } from '../../data/link/operationLink';
import { Budget, BudgetSplitOptions } from '../../data/operation/budget';
import { HistoricOperation } from '../../data/operation/historicOperation';
import { PlannedOperation, PlannedOperationSplitOptions } from '../../data/operation/plannedOperation';
import { Target, TargetKey, targetKeyOf } from '../../data/operation/target';
import type { BudgetId, Category, OperationId, PlannedOperationId } from '../../data/operation/types';
import { ForecasterConfig, applyLogLevel, loadConfig } from '../config/config';
import { formatDate, isSame } from '../date/date';
import { TargetNotFoundError, UnsavedTargetError } from '../errors/errors';
import type { ForecastRepository } from '../io/repository';
import { debug, log, warn } from '../log/logger';
import { MatcherCache } from '../matching/matcherCache';
import {
  createHeuristicLinks,
  createManualLink,
  migrateLinksAfterSplit,
  nextNonActualizedIteration,
  recalculateLinksForTarget,
} from '../matching/operationLinkService';
import { categorizeOperations } from '../matching/operationsCategorizer';
import { AccountForecaster, BalancePoint } from './accountForecaster';
import type { Forecast } from './forecast';
import { ForecastActualizer } from './forecastActualizer';

export type CategorizationResult = {
  operation: HistoricOperation;
  categoryChanged: boolean;
  /** Automatic link created after the change, if any. */
  createdLink: OperationLink | null;
};

/**
 * Runs reconciliation against a repository: keeps automatic links in sync
 * with the targets, actualizes the forecast and projects the account.
 */
export class ReconciliationService {
  private readonly repository: ForecastRepository;
  readonly config: ForecasterConfig;
  private matcherCache: MatcherCache | null = null;

  constructor(repository: ForecastRepository, config: ForecasterConfig = loadConfig({})) {
    this.repository = repository;
    this.config = config;
    applyLogLevel(config);
  }

  private get matchers(): MatcherCache {
    if (this.matcherCache === null) {
      this.matcherCache = MatcherCache.fromForecast(this.loadForecast());
    }
    return this.matcherCache;
  }

  /**
   * Stored targets with their links attached. Archived planned operations are left out.
   */
  loadForecast(): Forecast {
    const links = this.repository.getLinks();
    return {
      operations: this.repository
        .getPlannedOperations()
        .filter((plannedOperation) => !plannedOperation.isArchived)
        .map((plannedOperation) => plannedOperation.withLinks(links)),
      budgets: this.repository.getBudgets().map((budget) => budget.withLinks(links)),
    };
  }

  private operationsAmong(operationIds?: readonly OperationId[]): readonly HistoricOperation[] {
    const { operations } = this.repository.getAccount();
    if (operationIds === undefined) {
      return operations;
    }
    const wanted = new Set(operationIds);
    return operations.filter((operation) => wanted.has(operation.uniqueId));
  }

  // Cached matchers may hold links deleted since: match on heuristics only
  private linkOperations(operations: readonly HistoricOperation[]): OperationLink[] {
    const heuristicMatchers = this.matchers
      .entries()
      .map(({ key, matcher }) => ({ key, matcher: matcher.withLinks([]) }));
    const created = createHeuristicLinks(operations, heuristicMatchers, this.repository.getLinks());
    for (const link of created) {
      this.repository.upsertLink(link);
    }
    return created;
  }

  /**
   * Links transactions not linked yet to their best matching target, typically
   * right after importing them. Defaults to every transaction of the account.
   */
  linkUnlinkedOperations(operationIds?: readonly OperationId[]): OperationLink[] {
    return this.linkOperations(this.operationsAmong(operationIds));
  }

  /**
   * Actualizes the stored forecast against the stored links. Links are not touched.
   */
  actualize(): Forecast {
    const account = this.repository.getAccount();
    const forecast = this.loadForecast();
    return new ForecastActualizer(account, this.repository.getLinks()).actualize(forecast);
  }

  project(targetDate: Date): Account {
    return new AccountForecaster(this.repository.getAccount(), this.actualize()).at(targetDate);
  }

  balanceEvolution(from: Date, to: Date): BalancePoint[] {
    return new AccountForecaster(this.repository.getAccount(), this.actualize()).balanceEvolution(from, to);
  }

  private storedKey(target: Target): TargetKey {
    const key = targetKeyOf(target);
    if (key === null) {
      throw new UnsavedTargetError(target.description);
    }
    return key;
  }

  private recalculate(target: Target): OperationLink[] {
    const { created, removed } = recalculateLinksForTarget(
      target,
      this.repository.getAccount().operations,
      this.repository.getLinks(),
    );
    const key = this.storedKey(target);
    if (removed.length > 0) {
      this.repository.deleteAutomaticLinksForTarget(key.targetType, key.targetId);
    }
    for (const link of created) {
      this.repository.upsertLink(link);
    }
    return created;
  }

  private manualLinks(): OperationLink[] {
    return this.repository.getLinks().filter((link) => link.isManual);
  }

  /**
   * An archived planned operation leaves matching and loses its automatic links.
   */
  private retire(stored: PlannedOperation): PlannedOperation {
    const key = this.storedKey(stored);
    this.matchers.remove(key);
    this.repository.deleteAutomaticLinksForTarget(key.targetType, key.targetId);
    debug('Archived planned operation', key.targetId);
    return stored;
  }

  addPlannedOperation(plannedOperation: PlannedOperation): PlannedOperation {
    const stored = this.repository.upsertPlannedOperation(plannedOperation);
    if (stored.isArchived) {
      return this.retire(stored);
    }
    this.matchers.insert(stored);
    this.recalculate(stored);
    return stored;
  }

  /**
   * Stores the new definition and rebuilds its automatic links. Manual links are kept.
   */
  updatePlannedOperation(plannedOperation: PlannedOperation): PlannedOperation {
    this.storedKey(plannedOperation);
    if (plannedOperation.isArchived) {
      return this.retire(this.repository.upsertPlannedOperation(plannedOperation));
    }
    // Fails before storing when a manual link is off the new iteration grid
    const withManualLinks = plannedOperation.withLinks(this.manualLinks());
    const stored = this.repository.upsertPlannedOperation(plannedOperation);
    this.matchers.insert(withManualLinks);
    this.recalculate(withManualLinks);
    return stored;
  }

  deletePlannedOperation(id: PlannedOperationId): void {
    this.repository.deleteLinksForTarget(LinkType.PLANNED_OPERATION, id);
    this.matchers.remove({ targetType: LinkType.PLANNED_OPERATION, targetId: id });
    this.repository.deletePlannedOperation(id);
  }

  addBudget(budget: Budget): Budget {
    const stored = this.repository.upsertBudget(budget);
    this.matchers.insert(stored);
    this.recalculate(stored);
    return stored;
  }

  updateBudget(budget: Budget): Budget {
    this.storedKey(budget);
    // Fails before storing when a manual link is off the new iteration grid
    const withManualLinks = budget.withLinks(this.manualLinks());
    const stored = this.repository.upsertBudget(budget);
    this.matchers.insert(withManualLinks);
    this.recalculate(withManualLinks);
    return stored;
  }

  deleteBudget(id: BudgetId): void {
    this.repository.deleteLinksForTarget(LinkType.BUDGET, id);
    this.matchers.remove({ targetType: LinkType.BUDGET, targetId: id });
    this.repository.deleteBudget(id);
  }

  private findTarget(key: TargetKey): Target {
    const target =
      key.targetType === LinkType.PLANNED_OPERATION
        ? this.repository.getPlannedOperation(key.targetId)
        : this.repository.getBudget(key.targetId);
    if (target === null) {
      throw new TargetNotFoundError(key.targetType, key.targetId);
    }
    return target;
  }

  /**
   * Links a transaction to a target iteration on the user's behalf, replacing any existing link.
   */
  linkManually(operationId: OperationId, key: TargetKey, iterationDate: Date, notes: string | null = null): OperationLink {
    const operation = this.repository.getAccount().operationById(operationId);
    if (operation === undefined) {
      throw new TargetNotFoundError('operation', operationId);
    }
    const link = createManualLink(operation, this.findTarget(key), iterationDate, notes);
    this.repository.upsertLink(link);
    return link;
  }

  unlink(operationId: OperationId): void {
    this.repository.deleteLink(operationId);
  }

  /**
   * Sets the category of the given transactions. A changed transaction loses
   * its automatic link and is linked again under its new category; a manual
   * link stays. Unknown ids are skipped.
   */
  recategorize(operationIds: readonly OperationId[], category: Category): CategorizationResult[] {
    const updated: { operation: HistoricOperation; categoryChanged: boolean }[] = [];
    const toRelink: HistoricOperation[] = [];

    for (const operationId of operationIds) {
      const existing = this.repository.getAccount().operationById(operationId);
      if (existing === undefined) {
        warn('Skipping unknown operation', operationId);
        continue;
      }
      if (existing.category === category) {
        updated.push({ operation: existing, categoryChanged: false });
        continue;
      }
      const operation = this.repository.updateOperationCategory(operationId, category);
      if (operation === null) {
        throw new TargetNotFoundError('operation', operationId);
      }
      updated.push({ operation, categoryChanged: true });

      const link = this.repository.getLinkForOperation(operationId);
      if (link?.isManual) {
        continue;
      }
      if (link !== null) {
        this.repository.deleteLink(operationId);
      }
      toRelink.push(operation);
    }

    const created = new Map(this.linkOperations(toRelink).map((link) => [link.operationId, link]));
    return updated.map(({ operation, categoryChanged }) => ({
      operation,
      categoryChanged,
      createdLink: created.get(operation.uniqueId) ?? null,
    }));
  }

  /**
   * Gives transactions the category of the planned operation recognizing
   * them. Defaults to every transaction of the account.
   */
  categorizeFromForecast(operationIds?: readonly OperationId[]): CategorizationResult[] {
    const candidates = this.operationsAmong(operationIds);

    return categorizeOperations(candidates, this.loadForecast())
      .filter((categorized, index) => categorized !== candidates[index])
      .flatMap((categorized) => this.recategorize([categorized.uniqueId], categorized.category));
  }

  nextNonActualizedIteration(key: TargetKey, fromDate: Date): DateRange | null {
    return nextNonActualizedIteration(this.findTarget(key), this.repository.getLinks(), fromDate);
  }

  splitPlannedOperation(
    id: PlannedOperationId,
    splitDate: Date,
    options: PlannedOperationSplitOptions = {},
  ): PlannedOperation {
    const original = this.repository.getPlannedOperation(id);
    if (original === null) {
      throw new TargetNotFoundError(LinkType.PLANNED_OPERATION, id);
    }
    const [terminated, continuation] = original.splitAt(splitDate, options);
    this.repository.upsertPlannedOperation(terminated);
    const created = this.repository.upsertPlannedOperation(continuation);
    const key = this.storedKey(created);
    this.migrateLinks(LinkType.PLANNED_OPERATION, id, created, splitDate);
    this.matchers.insert(terminated);
    this.matchers.insert(created);
    log('Split planned operation', id, { at: splitDate, continuation: key.targetId });
    return created;
  }

  splitBudget(id: BudgetId, splitDate: Date, options: BudgetSplitOptions = {}): Budget {
    const original = this.repository.getBudget(id);
    if (original === null) {
      throw new TargetNotFoundError(LinkType.BUDGET, id);
    }
    const [terminated, continuation] = original.splitAt(splitDate, options);
    this.repository.upsertBudget(terminated);
    const created = this.repository.upsertBudget(continuation);
    const key = this.storedKey(created);
    this.migrateLinks(LinkType.BUDGET, id, created, splitDate);
    this.matchers.insert(terminated);
    this.matchers.insert(created);
    log('Split budget', id, { at: splitDate, continuation: key.targetId });
    return created;
  }

  /**
   * Moves the links of migrated iterations to the continuation. A link that
   * no longer falls on an iteration start of the continuation is dropped.
   */
  private migrateLinks(targetType: LinkType, oldTargetId: number, continuation: Target, splitDate: Date): void {
    const key = this.storedKey(continuation);
    const migrated = migrateLinksAfterSplit(this.repository.getLinks(), targetType, oldTargetId, key.targetId, splitDate);

    for (const link of migrated) {
      if (!isLinkTo(link, targetType, key.targetId)) {
        continue;
      }
      const iteration = continuation.interval.current(link.iterationDate);
      if (iteration === null || !isSame(iteration.startDate, link.iterationDate)) {
        warn('Dropping link off the new iteration grid', link.operationId, { iterationDate: link.iterationDate });
        this.repository.deleteLink(link.operationId);
        continue;
      }
      this.repository.upsertLink(link);
    }
    debug('Migrated links', { target: oldTargetId, continuation: key.targetId, splitDate: formatDate(splitDate) });
  }
}
