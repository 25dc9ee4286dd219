/**
 * Column projection helpers: select, drop_columns, rename
 */

import { z } from 'zod';
import { ParameterValidationError, UnknownColumnError, defineOperation, type Row } from '@tabflow/core';

function project(rows: readonly Row[], mapping: ReadonlyArray<readonly [string, string]>) {
  return rows.map((row) => Object.fromEntries(mapping.map(([from, to]) => [to, row[from] ?? null])));
}

function firstDuplicate(names: readonly string[]): string | undefined {
  return names.find((name, index) => names.indexOf(name) !== index);
}

export const SelectParamsSchema = z.object({
  columns: z.array(z.string().min(1)).min(1).describe('Columns to keep, in output order'),
});

export const selectOperation = defineOperation({
  name: 'select',
  description: 'Keep only the given columns, in the given order',
  schema: SelectParamsSchema,
  apply(dataset, { columns }) {
    const duplicate = firstDuplicate(columns);
    if (duplicate !== undefined) {
      throw new ParameterValidationError('select', [
        { path: 'columns', message: `Column '${duplicate}' is listed twice` },
      ]);
    }
    dataset.requireColumns(columns);
    return dataset.withColumns(
      columns,
      project(
        dataset.rows,
        columns.map((column) => [column, column] as const)
      )
    );
  },
});

export const DropColumnsParamsSchema = z.object({
  columns: z.array(z.string().min(1)).min(1).describe('Columns to remove'),
  ignore_missing: z.boolean().default(true).describe('Skip names that are not columns instead of failing'),
});

export const dropColumnsOperation = defineOperation({
  name: 'drop_columns',
  description: 'Remove columns',
  schema: DropColumnsParamsSchema,
  apply(dataset, { columns, ignore_missing }) {
    if (!ignore_missing) {
      dataset.requireColumns(columns);
    }
    const kept = dataset.columns.filter((column) => !columns.includes(column));
    return dataset.withColumns(
      kept,
      project(
        dataset.rows,
        kept.map((column) => [column, column] as const)
      )
    );
  },
});

export const RenameParamsSchema = z.object({
  mapping: z.record(z.string().min(1)).describe('Old column name to new column name'),
});

export const renameOperation = defineOperation({
  name: 'rename',
  description: 'Rename columns, keeping their position',
  schema: RenameParamsSchema,
  apply(dataset, { mapping }) {
    for (const from of Object.keys(mapping)) {
      if (!dataset.hasColumn(from)) throw new UnknownColumnError(from, dataset.columns);
    }
    const pairs = dataset.columns.map((column) => {
      const to = Object.prototype.hasOwnProperty.call(mapping, column) ? mapping[column] : undefined;
      return [column, to ?? column] as const;
    });
    const renamed = pairs.map(([, to]) => to);
    const duplicate = firstDuplicate(renamed);
    if (duplicate !== undefined) {
      throw new ParameterValidationError('rename', [
        { path: 'mapping', message: `Column '${duplicate}' would appear twice` },
      ]);
    }
    return dataset.withColumns(renamed, project(dataset.rows, pairs));
  },
});
