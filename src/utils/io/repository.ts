import { Account } from '../../data/account/account';
import { LinkType, OperationLink } from '../../data/link/operationLink';
import { Budget } from '../../data/operation/budget';
import { HistoricOperation } from '../../data/operation/historicOperation';
import { PlannedOperation } from '../../data/operation/plannedOperation';
import type { BudgetId, Category, OperationId, PlannedOperationId, TargetId } from '../../data/operation/types';

/**
 * Storage the reconciliation works against. Targets are returned without
 * their links; links are read separately.
 *
 * Upserting a target without an id stores it under a new id and returns the
 * stored copy.
 */
export interface ForecastRepository {
  getAccount(): Account;
  /** Returns the updated transaction, or null when there is none with that id. */
  updateOperationCategory(operationId: OperationId, category: Category): HistoricOperation | null;

  getPlannedOperations(): PlannedOperation[];
  getPlannedOperation(id: PlannedOperationId): PlannedOperation | null;
  upsertPlannedOperation(plannedOperation: PlannedOperation): PlannedOperation;
  deletePlannedOperation(id: PlannedOperationId): void;

  getBudgets(): Budget[];
  getBudget(id: BudgetId): Budget | null;
  upsertBudget(budget: Budget): Budget;
  deleteBudget(id: BudgetId): void;

  getLinks(): OperationLink[];
  getLinkForOperation(operationId: OperationId): OperationLink | null;
  /** Replaces the link of the same operation, if any. */
  upsertLink(link: OperationLink): void;
  deleteLink(operationId: OperationId): void;
  deleteLinksForTarget(targetType: LinkType, targetId: TargetId): void;
  deleteAutomaticLinksForTarget(targetType: LinkType, targetId: TargetId): void;
}
