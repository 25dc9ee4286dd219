/**
 * Scalar Types
 *
 * Every cell of a dataset holds one of these values. The union is the tag:
 * `scalarKind()` reads it back as one of the five kinds.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * A single cell value. Numbers are always finite.
 */
export type Scalar = number | string | boolean | null;

export type ScalarKind = 'integer' | 'float' | 'string' | 'boolean' | 'null';

export const ScalarSchema = z.union([z.number().finite(), z.string(), z.boolean(), z.null()]);

export function isScalar(value: unknown): value is Scalar {
  switch (typeof value) {
    case 'number':
      return Number.isFinite(value);
    case 'string':
    case 'boolean':
      return true;
    default:
      return value === null;
  }
}

export function scalarKind(value: Scalar): ScalarKind {
  if (value === null) return 'null';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  if (typeof value === 'boolean') return 'boolean';
  return 'string';
}

/**
 * Exact, type-sensitive equality: `1` never equals `"1"`, and `null` equals `null`.
 */
export function scalarsEqual(a: Scalar, b: Scalar): boolean {
  return a === b;
}

// boolean < number < string when kinds differ
const KIND_RANK: Record<'boolean' | 'number' | 'string', number> = {
  boolean: 0,
  number: 1,
  string: 2,
};

/**
 * Total order over non-null scalars.
 *
 * Values of the same kind compare naturally (strings by code unit, so the
 * order does not depend on the host locale); different kinds compare by
 * kind rank.
 */
export function compareNonNull(a: number | string | boolean, b: number | string | boolean): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a === b ? 0 : a < b ? -1 : 1;
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  return KIND_RANK[rankKey(a)] - KIND_RANK[rankKey(b)];
}

function rankKey(value: number | string | boolean): 'boolean' | 'number' | 'string' {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return 'number';
  return 'string';
}

/**
 * Ascending comparator with nulls ordered after every other value.
 */
export function compareScalars(a: Scalar, b: Scalar): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return compareNonNull(a, b);
}

/**
 * Stable string key for a tuple of scalars, distinguishing kinds
 * (`[1]` and `["1"]` produce different keys).
 */
export function tupleKey(values: readonly Scalar[]): string {
  return JSON.stringify(values);
}
