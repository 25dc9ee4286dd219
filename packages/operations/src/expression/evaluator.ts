/**
 * Predicate evaluation
 *
 * Semantics:
 * - `==` / `!=` are exact and type-sensitive; `x == null` holds only for null
 * - ordering comparisons are false when either side is null or the kinds differ
 * - arithmetic works on numbers (and `+` on two strings); anything else is null,
 *   as is a non-finite result such as division by zero
 * - only the boolean `true` counts as true for `and`, `or`, `not` and row selection
 */

import {
  InvalidExpressionError,
  compareNonNull,
  scalarsEqual,
  type Row,
  type Scalar,
} from '@tabflow/core';
import { parseExpression, type Expr } from './parser.js';
import type { ArithmeticOperator, ComparisonOperator } from './tokenizer.js';

export interface CompiledPredicate {
  readonly source: string;
  /** Columns the expression reads, in first-reference order */
  readonly columns: readonly string[];
  evaluate(row: Row): Scalar;
  test(row: Row): boolean;
}

function finite(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

function arithmetic(op: ArithmeticOperator, left: Scalar, right: Scalar): Scalar {
  if (op === '+' && typeof left === 'string' && typeof right === 'string') {
    return left + right;
  }
  if (typeof left !== 'number' || typeof right !== 'number') {
    return null;
  }
  switch (op) {
    case '+':
      return finite(left + right);
    case '-':
      return finite(left - right);
    case '*':
      return finite(left * right);
    case '/':
      return right === 0 ? null : finite(left / right);
  }
}

function compare(op: ComparisonOperator, left: Scalar, right: Scalar): boolean {
  if (op === '==') return scalarsEqual(left, right);
  if (op === '!=') return !scalarsEqual(left, right);
  if (left === null || right === null || typeof left !== typeof right) {
    return false;
  }
  const order = compareNonNull(left, right);
  switch (op) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

function evaluate(expr: Expr, row: Row): Scalar {
  switch (expr.type) {
    case 'literal':
      return expr.value;
    case 'column':
      return row[expr.name] ?? null;
    case 'unary': {
      const value = evaluate(expr.expr, row);
      if (expr.op === 'not') return value !== true;
      return typeof value === 'number' ? finite(-value) : null;
    }
    case 'isNull': {
      const isNull = evaluate(expr.expr, row) === null;
      return expr.negated ? !isNull : isNull;
    }
    case 'in': {
      const value = evaluate(expr.expr, row);
      const found = expr.values.some((candidate) => scalarsEqual(value, evaluate(candidate, row)));
      return expr.negated ? !found : found;
    }
    case 'binary': {
      if (expr.op === 'and') {
        return evaluate(expr.left, row) === true && evaluate(expr.right, row) === true;
      }
      if (expr.op === 'or') {
        return evaluate(expr.left, row) === true || evaluate(expr.right, row) === true;
      }
      const left = evaluate(expr.left, row);
      const right = evaluate(expr.right, row);
      if (expr.op === '+' || expr.op === '-' || expr.op === '*' || expr.op === '/') {
        return arithmetic(expr.op, left, right);
      }
      return compare(expr.op, left, right);
    }
  }
}

function collectColumns(expr: Expr, found: Map<string, number>): void {
  switch (expr.type) {
    case 'literal':
      return;
    case 'column':
      if (!found.has(expr.name)) found.set(expr.name, expr.position);
      return;
    case 'unary':
    case 'isNull':
      collectColumns(expr.expr, found);
      return;
    case 'in':
      collectColumns(expr.expr, found);
      expr.values.forEach((value) => collectColumns(value, found));
      return;
    case 'binary':
      collectColumns(expr.left, found);
      collectColumns(expr.right, found);
      return;
  }
}

/**
 * Whether an expression can produce a boolean at all. Arithmetic and non-boolean
 * literals cannot, so using one as a whole predicate is rejected up front.
 */
function isPredicate(expr: Expr): boolean {
  switch (expr.type) {
    case 'literal':
      return typeof expr.value === 'boolean';
    case 'column':
    case 'isNull':
    case 'in':
      return true;
    case 'unary':
      return expr.op === 'not';
    case 'binary':
      return !(expr.op === '+' || expr.op === '-' || expr.op === '*' || expr.op === '/');
  }
}

/**
 * Parse a predicate and bind it to a set of columns.
 *
 * @throws InvalidExpressionError for syntax errors, references to columns that
 * are not in `columns`, and expressions that cannot produce a boolean
 */
export function compilePredicate(source: string, columns: readonly string[]): CompiledPredicate {
  const expr = parseExpression(source);

  const referenced = new Map<string, number>();
  collectColumns(expr, referenced);
  for (const [name, position] of referenced) {
    if (!columns.includes(name)) {
      throw new InvalidExpressionError(source, `unknown column '${name}'`, position);
    }
  }

  if (!isPredicate(expr)) {
    throw new InvalidExpressionError(source, 'expression does not produce a boolean');
  }

  return {
    source,
    columns: [...referenced.keys()],
    evaluate: (row) => evaluate(expr, row),
    test: (row) => evaluate(expr, row) === true,
  };
}
