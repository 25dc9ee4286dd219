/**
 * Row cleaning: drop_duplicates, fill_missing
 */

import { z } from 'zod';
import { ScalarSchema, defineOperation, tupleKey, type Row } from '@tabflow/core';

export const DropDuplicatesParamsSchema = z.object({
  subset: z.array(z.string().min(1)).min(1).optional().describe('Columns that identify a duplicate; defaults to all'),
  keep: z.enum(['first', 'last']).default('first'),
});

export const dropDuplicatesOperation = defineOperation({
  name: 'drop_duplicates',
  description: 'Remove repeated rows, keeping the first or last occurrence',
  schema: DropDuplicatesParamsSchema,
  apply(dataset, { subset, keep }) {
    const columns = subset ?? dataset.columns;
    dataset.requireColumns(columns);

    const keyOf = (row: Row) => tupleKey(columns.map((column) => row[column] ?? null));
    const chosen = new Map<string, number>();
    dataset.rows.forEach((row, index) => {
      const key = keyOf(row);
      if (keep === 'last' || !chosen.has(key)) chosen.set(key, index);
    });

    const kept = new Set(chosen.values());
    return dataset.withRows(dataset.rows.filter((_, index) => kept.has(index)));
  },
});

export const FillMissingParamsSchema = z.object({
  strategy: z.enum(['fill', 'drop']).default('fill').describe('Replace nulls, or drop rows that contain one'),
  value: ScalarSchema.default('').describe('Replacement for nulls when strategy is "fill"'),
  columns: z.array(z.string().min(1)).min(1).optional().describe('Columns to inspect; defaults to all'),
});

export const fillMissingOperation = defineOperation({
  name: 'fill_missing',
  description: 'Fill null cells with a value, or drop rows that contain nulls',
  schema: FillMissingParamsSchema,
  apply(dataset, { strategy, value, columns }) {
    const targets = columns ?? dataset.columns;
    dataset.requireColumns(targets);

    if (strategy === 'drop') {
      return dataset.withRows(dataset.rows.filter((row) => targets.every((column) => row[column] !== null)));
    }
    return dataset.withRows(
      dataset.rows.map((row) =>
        Object.fromEntries(
          dataset.columns.map((column) => {
            const cell = row[column] ?? null;
            return [column, cell === null && targets.includes(column) ? value : cell];
          })
        )
      )
    );
  },
});
