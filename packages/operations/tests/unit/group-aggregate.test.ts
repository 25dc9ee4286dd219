import { describe, it, expect } from 'vitest';
import type { z } from 'zod';
import {
  ColumnTypeError,
  Dataset,
  ParameterValidationError,
  UnknownColumnError,
  UnsupportedAggregateError,
} from '@tabflow/core';
import { GroupAggregateParamsSchema, groupAggregateOperation } from '../../src/group-aggregate.js';

const group = (dataset: Dataset, params: z.input<typeof GroupAggregateParamsSchema>) =>
  groupAggregateOperation.apply(dataset, GroupAggregateParamsSchema.parse(params));

describe('group_aggregate operation', () => {
  it('sums per group in first-seen order', () => {
    const dataset = Dataset.fromRecords([
      { id: 1, val: 10 },
      { id: 2, val: 20 },
      { id: 1, val: 5 },
    ]);
    const result = group(dataset, { group_by: ['id'], agg: { val: 'sum' } });
    expect(result.columns).toEqual(['id', 'val']);
    expect(result.toRecords()).toEqual([
      { id: 1, val: 15 },
      { id: 2, val: 20 },
    ]);
  });

  it('names outputs column_fn when a column has several functions', () => {
    const dataset = Dataset.fromRecords([
      { g: 'a', v: 1 },
      { g: 'a', v: null },
      { g: 'b', v: 4 },
      { g: 'a', v: 3 },
    ]);
    const result = group(dataset, { group_by: 'g', agg: { v: ['sum', 'mean', 'count', 'size'] } });
    expect(result.columns).toEqual(['g', 'v_sum', 'v_mean', 'v_count', 'v_size']);
    expect(result.toRecords()).toEqual([
      { g: 'a', v_sum: 4, v_mean: 2, v_count: 2, v_size: 3 },
      { g: 'b', v_sum: 4, v_mean: 4, v_count: 1, v_size: 1 },
    ]);
  });

  it('counts group sizes when no aggregation is given', () => {
    const dataset = Dataset.fromRecords([{ g: 'a' }, { g: 'b' }, { g: 'a' }, { g: 'a' }]);
    expect(group(dataset, { group_by: 'g' }).toRecords()).toEqual([
      { g: 'a', count: 3 },
      { g: 'b', count: 1 },
    ]);
  });

  it('groups by several columns and keeps nulls as their own group', () => {
    const dataset = Dataset.fromRecords([
      { a: 1, b: 'x' },
      { a: 1, b: 'y' },
      { a: 1, b: 'x' },
      { a: null, b: 'x' },
    ]);
    expect(group(dataset, { group_by: ['a', 'b'] }).toRecords()).toEqual([
      { a: 1, b: 'x', count: 2 },
      { a: 1, b: 'y', count: 1 },
      { a: null, b: 'x', count: 1 },
    ]);
  });

  it('keeps keys of different kinds apart', () => {
    const dataset = Dataset.fromRecords([{ k: 1 }, { k: '1' }]);
    expect(group(dataset, { group_by: 'k' }).rowCount).toBe(2);
  });

  it('computes order and distinct statistics ignoring nulls', () => {
    const dataset = Dataset.fromRecords([
      { g: 'a', v: 5 },
      { g: 'a', v: 1 },
      { g: 'a', v: null },
      { g: 'a', v: 3 },
      { g: 'a', v: 1 },
    ]);
    const result = group(dataset, {
      group_by: 'g',
      agg: { v: ['median', 'min', 'max', 'first', 'last', 'nunique'] },
    });
    expect(result.toRecords()).toEqual([
      { g: 'a', v_median: 2, v_min: 1, v_max: 5, v_first: 5, v_last: 1, v_nunique: 3 },
    ]);
  });

  it('returns 0 for the sum and null for the mean of an all-null group', () => {
    const dataset = Dataset.fromRecords([{ g: 'a', v: null }]);
    expect(group(dataset, { group_by: 'g', agg: { v: ['sum', 'mean', 'min'] } }).toRecords()).toEqual([
      { g: 'a', v_sum: 0, v_mean: null, v_min: null },
    ]);
  });

  it('supports min and max over strings', () => {
    const dataset = Dataset.fromRecords([
      { g: 1, name: 'pear' },
      { g: 1, name: 'apple' },
    ]);
    expect(group(dataset, { group_by: 'g', agg: { name: ['min', 'max'] } }).toRecords()).toEqual([
      { g: 1, name_min: 'apple', name_max: 'pear' },
    ]);
  });

  it('produces an empty result for an empty dataset', () => {
    const result = group(Dataset.empty(['g', 'v']), { group_by: 'g', agg: { v: 'sum' } });
    expect(result.columns).toEqual(['g', 'v']);
    expect(result.rowCount).toBe(0);
  });

  describe('errors', () => {
    const dataset = Dataset.fromRecords([{ g: 1, v: 2, name: 'x' }]);

    it('rejects unsupported functions', () => {
      expect(() => group(dataset, { group_by: 'g', agg: { v: 'mode' } })).toThrow(UnsupportedAggregateError);
      expect(() => group(dataset, { group_by: 'g', agg: { v: 'mode' } })).toThrow(
        "Unsupported aggregate function 'mode'. Supported: sum, mean, median, min, max, count, size, first, last, nunique"
      );
    });

    it('rejects numeric functions over strings', () => {
      expect(() => group(dataset, { group_by: 'g', agg: { name: 'sum' } })).toThrow(ColumnTypeError);
      expect(() => group(dataset, { group_by: 'g', agg: { name: 'mean' } })).toThrow(
        "Column 'name' holds string values where number values are required"
      );
    });

    it('rejects unknown columns', () => {
      expect(() => group(dataset, { group_by: 'missing' })).toThrow(UnknownColumnError);
      expect(() => group(dataset, { group_by: 'g', agg: { missing: 'sum' } })).toThrow(UnknownColumnError);
    });

    it('rejects aggregating a grouping column', () => {
      expect(() => group(dataset, { group_by: 'g', agg: { g: 'sum' } })).toThrow(ParameterValidationError);
    });

    it('rejects output names that collide', () => {
      const counted = Dataset.fromRecords([{ count: 1 }]);
      expect(() => group(counted, { group_by: 'count' })).toThrow(
        "Invalid parameters for 'group_aggregate': agg: Output column 'count' would appear twice"
      );
    });
  });
});
