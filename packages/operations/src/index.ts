/**
 * @tabflow/operations
 *
 * The built-in operations. `BUILTIN_OPERATIONS` lists them in registration order.
 */

import type { OperationDefinition } from '@tabflow/core';
import { filterOperation } from './filter.js';
import { sortOperation } from './sort.js';
import { groupAggregateOperation } from './group-aggregate.js';
import { mergeOperation } from './merge.js';
import { selectOperation, dropColumnsOperation, renameOperation } from './columns.js';
import { dropDuplicatesOperation, fillMissingOperation } from './cleaning.js';
import { limitOperation } from './limit.js';

export * from './expression/index.js';
export { FilterParamsSchema, filterOperation } from './filter.js';
export {
  SortParamsSchema,
  SortKeySchema,
  SortDirectionSchema,
  compareRows,
  normalizeSortKeys,
  sortOperation,
  type SortDirection,
  type SortKey,
  type SortKeyInput,
} from './sort.js';
export { GroupAggregateParamsSchema, groupAggregateOperation } from './group-aggregate.js';
export {
  AGGREGATE_NAMES,
  aggregate,
  getAggregate,
  isAggregateName,
  type AggregateFunction,
  type AggregateName,
} from './aggregates.js';
export {
  MergeParamsSchema,
  JoinKindSchema,
  MergeValidateSchema,
  mergeOperation,
  type JoinKind,
  type MergeValidate,
} from './merge.js';
export {
  SelectParamsSchema,
  DropColumnsParamsSchema,
  RenameParamsSchema,
  selectOperation,
  dropColumnsOperation,
  renameOperation,
} from './columns.js';
export {
  DropDuplicatesParamsSchema,
  FillMissingParamsSchema,
  dropDuplicatesOperation,
  fillMissingOperation,
} from './cleaning.js';
export { LimitParamsSchema, limitOperation } from './limit.js';

export const BUILTIN_OPERATIONS: readonly OperationDefinition[] = [
  filterOperation,
  sortOperation,
  groupAggregateOperation,
  mergeOperation,
  selectOperation,
  dropColumnsOperation,
  renameOperation,
  dropDuplicatesOperation,
  fillMissingOperation,
  limitOperation,
];
