/** Spending or income category key, e.g. "groceries" or "salary". */
export type Category = string;

/** Unique identifier of a historic (bank) operation. */
export type OperationId = number;

/** Persisted identifier of a planned operation. */
export type PlannedOperationId = number;

/** Persisted identifier of a budget. */
export type BudgetId = number;

/** Identifier of a link target, planned operation or budget. */
export type TargetId = PlannedOperationId | BudgetId;
