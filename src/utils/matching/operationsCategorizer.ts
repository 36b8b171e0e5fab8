import { HistoricOperation } from '../../data/operation/historicOperation';
import { PlannedOperation } from '../../data/operation/plannedOperation';
import type { Category } from '../../data/operation/types';
import type { Forecast } from '../forecast/forecast';
import { debug } from '../log/logger';

/**
 * A planned operation lends its category when its description hints, amount
 * and date window all accept the transaction. Category is not checked.
 */
function categoryFor(operation: HistoricOperation, plannedOperations: readonly PlannedOperation[]): Category | null {
  const source = plannedOperations.find(
    ({ matcher }) =>
      matcher.matchDescription(operation) && matcher.matchAmount(operation) && matcher.matchDate(operation),
  );
  return source?.category ?? null;
}

/**
 * Returns the operations with the category of the first planned operation
 * recognizing them. Unrecognized operations come back unchanged.
 */
export function categorizeOperations(
  operations: readonly HistoricOperation[],
  forecast: Forecast,
): HistoricOperation[] {
  const plannedOperations = forecast.operations.filter((plannedOperation) => !plannedOperation.isArchived);
  return operations.map((operation) => {
    const category = categoryFor(operation, plannedOperations);
    if (category === null || category === operation.category) {
      return operation;
    }
    debug('Categorized operation', operation.uniqueId, { from: operation.category, to: category });
    return operation.withCategory(category);
  });
}
