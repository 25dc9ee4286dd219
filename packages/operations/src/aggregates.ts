/**
 * Aggregate functions for group_aggregate
 *
 * Each function receives every value of one column within one group. Nulls are
 * dropped before the function sees them, except for `size`.
 */

import {
  ColumnTypeError,
  UnsupportedAggregateError,
  compareNonNull,
  scalarKind,
  tupleKey,
  type Scalar,
} from '@tabflow/core';

export interface AggregateFunction {
  /** Counts nulls as well; every other function sees non-null values only */
  readonly includeNulls?: boolean;
  /** Requires numeric values */
  readonly numeric?: boolean;
  compute(values: readonly Scalar[]): Scalar;
}

function numbers(values: readonly Scalar[]): number[] {
  return values.filter((value): value is number => typeof value === 'number');
}

function extreme(values: readonly Scalar[], sign: 1 | -1): Scalar {
  let best: Scalar = null;
  for (const value of values) {
    if (value === null) continue;
    if (best === null || compareNonNull(value, best) * sign < 0) best = value;
  }
  return best;
}

const AGGREGATES = {
  sum: {
    numeric: true,
    compute: (values) => numbers(values).reduce((total, value) => total + value, 0),
  },
  mean: {
    numeric: true,
    compute: (values) => {
      const nums = numbers(values);
      return nums.length === 0 ? null : nums.reduce((total, value) => total + value, 0) / nums.length;
    },
  },
  median: {
    numeric: true,
    compute: (values) => {
      const nums = numbers(values).sort((a, b) => a - b);
      if (nums.length === 0) return null;
      const mid = Math.floor(nums.length / 2);
      const upper = nums[mid] ?? 0;
      return nums.length % 2 === 1 ? upper : ((nums[mid - 1] ?? 0) + upper) / 2;
    },
  },
  min: { compute: (values) => extreme(values, 1) },
  max: { compute: (values) => extreme(values, -1) },
  count: { compute: (values) => values.length },
  size: { includeNulls: true, compute: (values) => values.length },
  first: { compute: (values) => values[0] ?? null },
  last: { compute: (values) => values[values.length - 1] ?? null },
  nunique: { compute: (values) => new Set(values.map((value) => tupleKey([value]))).size },
} satisfies Record<string, AggregateFunction>;

export type AggregateName = keyof typeof AGGREGATES;

export const AGGREGATE_NAMES = Object.keys(AGGREGATES).filter(isAggregateName);

export function isAggregateName(name: string): name is AggregateName {
  return Object.prototype.hasOwnProperty.call(AGGREGATES, name);
}

/**
 * @throws UnsupportedAggregateError for a name outside the supported set
 */
export function getAggregate(name: string): AggregateFunction {
  if (!isAggregateName(name)) {
    throw new UnsupportedAggregateError(name, AGGREGATE_NAMES);
  }
  return AGGREGATES[name];
}

/**
 * Apply an aggregate to one group's values of `column`.
 *
 * @throws ColumnTypeError when a numeric aggregate meets a non-numeric value
 */
export function aggregate(fn: AggregateFunction, column: string, values: readonly Scalar[]): Scalar {
  if (fn.includeNulls) {
    return fn.compute(values);
  }
  const present = values.filter((value) => value !== null);
  if (fn.numeric) {
    const offending = present.find((value) => typeof value !== 'number');
    if (offending !== undefined && offending !== null) {
      throw new ColumnTypeError(column, 'number', scalarKind(offending));
    }
  }
  return fn.compute(present);
}
