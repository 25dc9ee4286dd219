/**
 * Operation Errors
 * ================
 * Every failure the engine, the registry or an operation can raise. All of
 * them are input errors: they are surfaced to the caller unchanged and never
 * corrected.
 */

import { AppError, type ErrorContext } from '@tabflow/utils';

/**
 * Base class for errors raised while resolving or applying an operation
 */
export class OperationError extends AppError {
  constructor(
    message: string,
    code: string = 'OPERATION_ERROR',
    statusCode: number = 400,
    context?: ErrorContext
  ) {
    super(message, code, statusCode, context);
  }
}

export class UnknownOperationError extends OperationError {
  public readonly operation: string;

  constructor(operation: string, available: readonly string[]) {
    const list = available.length > 0 ? available.join(', ') : '(none)';
    super(`Operation '${operation}' is not registered. Available: ${list}`, 'UNKNOWN_OPERATION', 404, {
      operation,
      available: [...available],
    });
    this.operation = operation;
  }
}

export class DuplicateOperationError extends OperationError {
  public readonly operation: string;

  constructor(operation: string) {
    super(
      `Operation '${operation}' is already registered (pass { override: true } to replace it)`,
      'DUPLICATE_OPERATION',
      409,
      { operation }
    );
    this.operation = operation;
  }
}

export interface ParameterIssue {
  path: string;
  message: string;
}

export class ParameterValidationError extends OperationError {
  public readonly issues: ParameterIssue[];

  constructor(operation: string, issues: ParameterIssue[]) {
    const summary = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid parameters for '${operation}': ${summary}`, 'PARAMETER_VALIDATION', 400, {
      operation,
      issues,
    });
    this.issues = issues;
  }
}

export class InvalidExpressionError extends OperationError {
  public readonly expression: string;
  public readonly position?: number;

  constructor(expression: string, reason: string, position?: number) {
    const where = position === undefined ? '' : ` at position ${position}`;
    super(`Invalid expression '${expression}'${where}: ${reason}`, 'INVALID_EXPRESSION', 400, {
      expression,
      reason,
      position,
    });
    this.expression = expression;
    this.position = position;
  }
}

export class UnknownColumnError extends OperationError {
  public readonly column: string;

  constructor(column: string, available: readonly string[]) {
    super(`Unknown column '${column}'. Available: ${available.join(', ')}`, 'UNKNOWN_COLUMN', 400, {
      column,
      available: [...available],
    });
    this.column = column;
  }
}

export class UnsupportedAggregateError extends OperationError {
  public readonly aggregate: string;

  constructor(aggregate: string, supported: readonly string[]) {
    super(
      `Unsupported aggregate function '${aggregate}'. Supported: ${supported.join(', ')}`,
      'UNSUPPORTED_AGGREGATE',
      400,
      { aggregate, supported: [...supported] }
    );
    this.aggregate = aggregate;
  }
}

export class JoinKeyMismatchError extends OperationError {
  constructor(message: string, context: { missingLeft: string[]; missingRight: string[] }) {
    super(message, 'JOIN_KEY_MISMATCH', 400, context);
  }
}

export class ColumnTypeError extends OperationError {
  constructor(column: string, expected: string, actual: string) {
    super(
      `Column '${column}' holds ${actual} values where ${expected} values are required`,
      'COLUMN_TYPE',
      400,
      { column, expected, actual }
    );
  }
}

export class MergeValidationError extends OperationError {
  constructor(validate: string, side: 'left' | 'right') {
    super(
      `Merge keys are not unique in the ${side} dataset, violating '${validate}'`,
      'MERGE_VALIDATION',
      400,
      { validate, side }
    );
  }
}

export class InvalidOperationResultError extends OperationError {
  constructor(operation: string, received: string) {
    super(
      `Operation '${operation}' returned ${received} instead of a Dataset`,
      'INVALID_OPERATION_RESULT',
      500,
      { operation, received }
    );
  }
}

export class NoDataError extends OperationError {
  constructor() {
    super('No dataset set. Call setData() first.', 'NO_DATA', 400);
  }
}

/**
 * Raised when a dataset is constructed from rows that break the table invariants
 */
export class InvalidDatasetError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'INVALID_DATASET', 400, context);
  }
}
