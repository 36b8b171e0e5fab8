import { Budget } from '../../data/operation/budget';
import { PlannedOperation } from '../../data/operation/plannedOperation';

/**
 * Everything expected to happen on an account.
 */
export type Forecast = {
  readonly operations: readonly PlannedOperation[];
  readonly budgets: readonly Budget[];
};

export function emptyForecast(): Forecast {
  return { operations: [], budgets: [] };
}
