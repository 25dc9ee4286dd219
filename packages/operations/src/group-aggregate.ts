/**
 * group_aggregate: one output row per distinct grouping key, in first-seen order
 */

import { z } from 'zod';
import {
  ParameterValidationError,
  defineOperation,
  tupleKey,
  type Row,
  type Scalar,
} from '@tabflow/core';
import { aggregate, getAggregate, type AggregateFunction } from './aggregates.js';

export const GroupAggregateParamsSchema = z.object({
  group_by: z
    .union([z.string().min(1), z.array(z.string().min(1)).min(1, 'At least one grouping column is required')])
    .describe('Grouping column or columns'),
  agg: z
    .record(z.union([z.string(), z.array(z.string()).min(1)]))
    .optional()
    .describe('Aggregate per column: a function name, or a list of them for column_fn outputs'),
});

interface OutputColumn {
  name: string;
  source: string;
  fn: AggregateFunction;
}

const GROUP_SIZE_COLUMN = 'count';

function planOutputs(
  groupBy: readonly string[],
  agg: Record<string, string | string[]> | undefined
): OutputColumn[] {
  if (agg === undefined) {
    return [{ name: GROUP_SIZE_COLUMN, source: groupBy[0] ?? '', fn: getAggregate('size') }];
  }
  const outputs: OutputColumn[] = [];
  for (const [source, fns] of Object.entries(agg)) {
    if (Array.isArray(fns)) {
      for (const name of fns) {
        outputs.push({ name: `${source}_${name}`, source, fn: getAggregate(name) });
      }
    } else {
      outputs.push({ name: source, source, fn: getAggregate(fns) });
    }
  }
  return outputs;
}

export const groupAggregateOperation = defineOperation({
  name: 'group_aggregate',
  description: 'Group rows by key columns and aggregate the others (sum, mean, median, min, max, count, size, first, last, nunique)',
  schema: GroupAggregateParamsSchema,
  apply(dataset, params) {
    const groupBy = typeof params.group_by === 'string' ? [params.group_by] : params.group_by;
    dataset.requireColumns(groupBy);
    if (params.agg) {
      dataset.requireColumns(Object.keys(params.agg));
    }

    const grouped = Object.keys(params.agg ?? {}).filter((column) => groupBy.includes(column));
    if (grouped.length > 0) {
      throw new ParameterValidationError(
        'group_aggregate',
        grouped.map((column) => ({ path: `agg.${column}`, message: 'Cannot aggregate a grouping column' }))
      );
    }

    const outputs = planOutputs(groupBy, params.agg);
    const columns = [...groupBy, ...outputs.map((output) => output.name)];
    const duplicate = columns.find((column, index) => columns.indexOf(column) !== index);
    if (duplicate !== undefined) {
      throw new ParameterValidationError('group_aggregate', [
        { path: 'agg', message: `Output column '${duplicate}' would appear twice` },
      ]);
    }

    const groups = new Map<string, Row[]>();
    for (const row of dataset.rows) {
      const key = tupleKey(groupBy.map((column) => row[column] ?? null));
      const members = groups.get(key);
      if (members) {
        members.push(row);
      } else {
        groups.set(key, [row]);
      }
    }

    const rows = [...groups.values()].map((members) => {
      const head: Row = members[0] ?? {};
      const entries: Array<[string, Scalar]> = groupBy.map((column) => [column, head[column] ?? null]);
      for (const output of outputs) {
        const values = members.map((row) => row[output.source] ?? null);
        entries.push([output.name, aggregate(output.fn, output.source, values)]);
      }
      return Object.fromEntries(entries);
    });

    return dataset.withColumns(columns, rows);
  },
});
