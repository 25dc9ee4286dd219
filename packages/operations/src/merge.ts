/**
 * merge: database-style join of the current dataset (left) with another (right)
 *
 * Keys match by exact, type-sensitive equality; a null key matches a null key.
 * Output columns are the left columns followed by the right non-key columns,
 * with `suffixes` applied to non-key names present on both sides.
 */

import { z } from 'zod';
import {
  DatasetSchema,
  JoinKeyMismatchError,
  MergeValidationError,
  ParameterValidationError,
  defineOperation,
  tupleKey,
  type Dataset,
  type Row,
  type Scalar,
} from '@tabflow/core';

export const JoinKindSchema = z.enum(['inner', 'left', 'right', 'outer']);
export type JoinKind = z.infer<typeof JoinKindSchema>;

export const MergeValidateSchema = z.enum(['one_to_one', 'one_to_many', 'many_to_one', 'many_to_many']);
export type MergeValidate = z.infer<typeof MergeValidateSchema>;

export const MergeParamsSchema = z.object({
  other: DatasetSchema,
  on: z
    .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
    .optional()
    .describe('Key column(s); defaults to the columns both datasets share'),
  how: JoinKindSchema.default('inner'),
  suffixes: z.tuple([z.string(), z.string()]).default(['_x', '_y']),
  validate: MergeValidateSchema.optional().describe('Expected key cardinality between the two sides'),
});

interface OutputColumn {
  name: string;
  side: 'key' | 'left' | 'right';
  source: string;
}

function resolveKeys(left: Dataset, right: Dataset, on: string | string[] | undefined): string[] {
  if (on === undefined) {
    const shared = left.columns.filter((column) => right.hasColumn(column));
    if (shared.length === 0) {
      throw new JoinKeyMismatchError('No shared columns to merge on; pass "on" explicitly', {
        missingLeft: [],
        missingRight: [],
      });
    }
    return shared;
  }

  const keys = typeof on === 'string' ? [on] : on;
  const missingLeft = keys.filter((key) => !left.hasColumn(key));
  const missingRight = keys.filter((key) => !right.hasColumn(key));
  if (missingLeft.length > 0 || missingRight.length > 0) {
    const parts = [
      missingLeft.length > 0 ? `left is missing ${missingLeft.join(', ')}` : '',
      missingRight.length > 0 ? `right is missing ${missingRight.join(', ')}` : '',
    ].filter(Boolean);
    throw new JoinKeyMismatchError(`Join key columns are absent: ${parts.join('; ')}`, {
      missingLeft,
      missingRight,
    });
  }
  return keys;
}

function indexByKey(rows: readonly Row[], keys: readonly string[]): Map<string, number[]> {
  const index = new Map<string, number[]>();
  rows.forEach((row, position) => {
    const key = tupleKey(keys.map((column) => row[column] ?? null));
    const positions = index.get(key);
    if (positions) {
      positions.push(position);
    } else {
      index.set(key, [position]);
    }
  });
  return index;
}

function checkCardinality(
  validate: MergeValidate | undefined,
  leftIndex: Map<string, number[]>,
  rightIndex: Map<string, number[]>
): void {
  if (validate === undefined || validate === 'many_to_many') return;
  const unique = (index: Map<string, number[]>) => [...index.values()].every((rows) => rows.length === 1);
  if ((validate === 'one_to_one' || validate === 'one_to_many') && !unique(leftIndex)) {
    throw new MergeValidationError(validate, 'left');
  }
  if ((validate === 'one_to_one' || validate === 'many_to_one') && !unique(rightIndex)) {
    throw new MergeValidationError(validate, 'right');
  }
}

function planColumns(
  left: Dataset,
  right: Dataset,
  keys: readonly string[],
  [leftSuffix, rightSuffix]: readonly [string, string]
): OutputColumn[] {
  const overlapping = new Set(
    left.columns.filter((column) => !keys.includes(column) && right.hasColumn(column))
  );
  const columns = left.columns.map((column): OutputColumn => {
    if (keys.includes(column)) return { name: column, side: 'key', source: column };
    const name = overlapping.has(column) ? `${column}${leftSuffix}` : column;
    return { name, side: 'left', source: column };
  });
  for (const column of right.columns) {
    if (keys.includes(column)) continue;
    const name = overlapping.has(column) ? `${column}${rightSuffix}` : column;
    columns.push({ name, side: 'right', source: column });
  }

  const names = columns.map((column) => column.name);
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate !== undefined) {
    throw new ParameterValidationError('merge', [
      { path: 'suffixes', message: `Suffixes produce the column '${duplicate}' twice` },
    ]);
  }
  return columns;
}

function combine(columns: readonly OutputColumn[], left: Row | undefined, right: Row | undefined): Row {
  const entries = columns.map((column): [string, Scalar] => {
    const from = column.side === 'key' ? left ?? right : column.side === 'left' ? left : right;
    return [column.name, from?.[column.source] ?? null];
  });
  return Object.fromEntries(entries);
}

export const mergeOperation = defineOperation({
  name: 'merge',
  description: 'Join with another dataset on key columns (inner, left, right or outer)',
  schema: MergeParamsSchema,
  apply(left, { other: right, on, how, suffixes, validate }) {
    const keys = resolveKeys(left, right, on);
    const leftIndex = indexByKey(left.rows, keys);
    const rightIndex = indexByKey(right.rows, keys);
    checkCardinality(validate, leftIndex, rightIndex);

    const columns = planColumns(left, right, keys, suffixes);
    const rows: Row[] = [];

    if (how === 'right') {
      for (const rightRow of right.rows) {
        const matches = leftIndex.get(tupleKey(keys.map((key) => rightRow[key] ?? null))) ?? [];
        if (matches.length === 0) {
          rows.push(combine(columns, undefined, rightRow));
        }
        for (const position of matches) {
          rows.push(combine(columns, left.rows[position], rightRow));
        }
      }
    } else {
      const matchedRight = new Set<number>();
      for (const leftRow of left.rows) {
        const matches = rightIndex.get(tupleKey(keys.map((key) => leftRow[key] ?? null))) ?? [];
        if (matches.length === 0 && how !== 'inner') {
          rows.push(combine(columns, leftRow, undefined));
        }
        for (const position of matches) {
          matchedRight.add(position);
          rows.push(combine(columns, leftRow, right.rows[position]));
        }
      }
      if (how === 'outer') {
        right.rows.forEach((rightRow, position) => {
          if (!matchedRight.has(position)) rows.push(combine(columns, undefined, rightRow));
        });
      }
    }

    return left.withColumns(
      columns.map((column) => column.name),
      rows
    );
  },
});
