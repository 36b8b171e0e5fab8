/**
 * Base class for every failure raised by the forecasting core.
 * The `code` is stable and safe to branch on; the message is for humans.
 */
export class ForecastError extends Error {
  code: string;
  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A recurring interval cannot be split at the requested date.
 */
export class InvalidSplitError extends ForecastError {
  constructor(message: string) {
    super(message, 'INVALID_SPLIT');
  }
}

/**
 * A split was requested on something that does not recur.
 */
export class NotPeriodicError extends ForecastError {
  constructor(message: string) {
    super(message, 'NOT_PERIODIC');
  }
}

/**
 * A link points at a date that is not an iteration start of its target.
 */
export class InvalidIterationError extends ForecastError {
  iterationDate: string;
  constructor(message: string, iterationDate: string) {
    super(message, 'INVALID_ITERATION');
    this.iterationDate = iterationDate;
  }
}

/**
 * The same transaction was linked more than once.
 */
export class DuplicateLinkError extends ForecastError {
  operationId: number;
  constructor(operationId: number) {
    super(`Operation ${operationId} is linked more than once`, 'DUPLICATE_LINK');
    this.operationId = operationId;
  }
}

export class CurrencyMismatchError extends ForecastError {
  left: string;
  right: string;
  constructor(left: string, right: string) {
    super(`Currency mismatch: ${left} vs ${right}`, 'CURRENCY_MISMATCH');
    this.left = left;
    this.right = right;
  }
}

/**
 * Structurally invalid interval: negative duration, empty period,
 * or an interval shape the owner does not accept.
 */
export class InvalidIntervalError extends ForecastError {
  constructor(message: string) {
    super(message, 'INVALID_INTERVAL');
  }
}

/**
 * A stored record could not be turned back into a domain value.
 */
export class InvalidRecordError extends ForecastError {
  field: string;
  constructor(message: string, field: string) {
    super(message, 'INVALID_RECORD');
    this.field = field;
  }
}

export class InvalidDateError extends ForecastError {
  constructor(value: string) {
    super(`Invalid date '${value}'`, 'INVALID_DATE');
  }
}

export class ConfigError extends ForecastError {
  key: string;
  constructor(message: string, key: string) {
    super(message, 'INVALID_CONFIG');
    this.key = key;
  }
}

/**
 * A planned operation or budget was used before being stored.
 */
export class UnsavedTargetError extends ForecastError {
  constructor(description: string) {
    super(`'${description}' has no id yet`, 'UNSAVED_TARGET');
  }
}

export class TargetNotFoundError extends ForecastError {
  targetType: string;
  targetId: number;
  constructor(targetType: string, targetId: number) {
    super(`No ${targetType} with id ${targetId}`, 'TARGET_NOT_FOUND');
    this.targetType = targetType;
    this.targetId = targetId;
  }
}
