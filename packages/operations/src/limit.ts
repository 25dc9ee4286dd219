import { z } from 'zod';
import { defineOperation } from '@tabflow/core';

export const LimitParamsSchema = z.object({
  count: z.number().int().nonnegative().describe('Maximum number of rows to keep'),
  offset: z.number().int().nonnegative().default(0).describe('Rows to skip first'),
});

export const limitOperation = defineOperation({
  name: 'limit',
  description: 'Keep a window of rows from the top of the table',
  schema: LimitParamsSchema,
  apply(dataset, { count, offset }) {
    return dataset.withRows(dataset.rows.slice(offset, offset + count));
  },
});
