/**
 * filter: keep the rows for which a predicate evaluates to true
 */

import { z } from 'zod';
import { defineOperation } from '@tabflow/core';
import { compilePredicate } from './expression/index.js';

export const FilterParamsSchema = z.object({
  expr: z.string().describe('Row predicate, e.g. "amount > 10 and region == \'EU\'"'),
});

export const filterOperation = defineOperation({
  name: 'filter',
  description: 'Keep rows matching a predicate expression, preserving their order',
  schema: FilterParamsSchema,
  apply(dataset, { expr }) {
    const predicate = compilePredicate(expr, dataset.columns);
    return dataset.withRows(dataset.rows.filter((row) => predicate.test(row)));
  },
});
