/**
 * sort: stable lexicographic ordering over one or more key columns
 *
 * Nulls sort after every other value in both directions. Values of different
 * kinds order boolean < number < string.
 */

import { z } from 'zod';
import { compareNonNull, defineOperation, type Row } from '@tabflow/core';

export const SortDirectionSchema = z.enum(['asc', 'desc']);
export type SortDirection = z.infer<typeof SortDirectionSchema>;

export const SortKeySchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), SortDirectionSchema]),
  z.object({ column: z.string().min(1), direction: SortDirectionSchema.default('asc') }).strict(),
]);
export type SortKeyInput = z.input<typeof SortKeySchema>;

export interface SortKey {
  column: string;
  direction: SortDirection;
}

export const SortParamsSchema = z.object({
  by: z
    .union([z.string().min(1), z.array(SortKeySchema).min(1, 'At least one sort key is required')])
    .describe('A column name, or a list of column | [column, direction] | { column, direction }'),
});

export function normalizeSortKeys(by: z.output<typeof SortParamsSchema>['by']): SortKey[] {
  const keys: Array<z.output<typeof SortKeySchema>> = typeof by === 'string' ? [by] : by;
  return keys.map((key): SortKey => {
    if (typeof key === 'string') return { column: key, direction: 'asc' };
    if (Array.isArray(key)) return { column: key[0], direction: key[1] };
    return { column: key.column, direction: key.direction };
  });
}

export function compareRows(a: Row, b: Row, keys: readonly SortKey[]): number {
  for (const { column, direction } of keys) {
    const left = a[column] ?? null;
    const right = b[column] ?? null;
    if (left === right) continue;
    if (left === null) return 1;
    if (right === null) return -1;
    const order = compareNonNull(left, right);
    if (order !== 0) return direction === 'asc' ? order : -order;
  }
  return 0;
}

export const sortOperation = defineOperation({
  name: 'sort',
  description: 'Sort rows by one or more columns (stable, nulls last)',
  schema: SortParamsSchema,
  apply(dataset, { by }) {
    const keys = normalizeSortKeys(by);
    dataset.requireColumns(keys.map((key) => key.column));

    const decorated = dataset.rows.map((row, index) => ({ row, index }));
    decorated.sort((a, b) => compareRows(a.row, b.row, keys) || a.index - b.index);
    return dataset.withRows(decorated.map(({ row }) => row));
  },
});
