import { describe, it, expect } from 'vitest';
import type { z } from 'zod';
import { Dataset, JoinKeyMismatchError, MergeValidationError } from '@tabflow/core';
import { MergeParamsSchema, mergeOperation } from '../../src/merge.js';

const merge = (left: Dataset, params: z.input<typeof MergeParamsSchema>) =>
  mergeOperation.apply(left, MergeParamsSchema.parse(params));

describe('merge operation', () => {
  const left = Dataset.fromRecords([
    { id: 1, l: 'a' },
    { id: 2, l: 'b' },
    { id: 3, l: 'c' },
  ]);
  const right = Dataset.fromRecords([
    { id: 2, r: 'x' },
    { id: 3, r: 'y' },
    { id: 3, r: 'z' },
    { id: 4, r: 'w' },
  ]);

  it('inner joins on a key column', () => {
    const result = merge(left, { other: right, on: 'id' });
    expect(result.columns).toEqual(['id', 'l', 'r']);
    expect(result.toRecords()).toEqual([
      { id: 2, l: 'b', r: 'x' },
      { id: 3, l: 'c', r: 'y' },
      { id: 3, l: 'c', r: 'z' },
    ]);
  });

  it('left joins with nulls for unmatched rows', () => {
    expect(merge(left, { other: right, on: 'id', how: 'left' }).toRecords()).toEqual([
      { id: 1, l: 'a', r: null },
      { id: 2, l: 'b', r: 'x' },
      { id: 3, l: 'c', r: 'y' },
      { id: 3, l: 'c', r: 'z' },
    ]);
  });

  it('right joins in right order', () => {
    expect(merge(left, { other: right, on: 'id', how: 'right' }).toRecords()).toEqual([
      { id: 2, l: 'b', r: 'x' },
      { id: 3, l: 'c', r: 'y' },
      { id: 3, l: 'c', r: 'z' },
      { id: 4, l: null, r: 'w' },
    ]);
  });

  it('outer joins append unmatched right rows', () => {
    expect(merge(left, { other: right, on: 'id', how: 'outer' }).toRecords()).toEqual([
      { id: 1, l: 'a', r: null },
      { id: 2, l: 'b', r: 'x' },
      { id: 3, l: 'c', r: 'y' },
      { id: 3, l: 'c', r: 'z' },
      { id: 4, l: null, r: 'w' },
    ]);
  });

  it('joins on shared columns by default', () => {
    expect(merge(left, { other: right }).rowCount).toBe(3);
  });

  it('suffixes overlapping non-key columns', () => {
    const a = Dataset.fromRecords([{ k: 1, v: 1 }]);
    const b = Dataset.fromRecords([{ k: 1, v: 2 }]);
    expect(merge(a, { other: b, on: 'k' }).toRecords()).toEqual([{ k: 1, v_x: 1, v_y: 2 }]);
    expect(merge(a, { other: b, on: 'k', suffixes: ['_l', '_r'] }).columns).toEqual(['k', 'v_l', 'v_r']);
  });

  it('matches null keys with each other', () => {
    const a = Dataset.fromRecords([{ k: null, a: 1 }]);
    const b = Dataset.fromRecords([{ k: null, b: 2 }]);
    expect(merge(a, { other: b, on: 'k' }).toRecords()).toEqual([{ k: null, a: 1, b: 2 }]);
  });

  it('compares keys with their types', () => {
    const a = Dataset.fromRecords([{ k: 1, a: 1 }]);
    const b = Dataset.fromRecords([{ k: '1', b: 2 }]);
    const result = merge(a, { other: b, on: 'k' });
    expect(result.columns).toEqual(['k', 'a', 'b']);
    expect(result.rowCount).toBe(0);
  });

  describe('errors', () => {
    it('fails when a key is missing on either side', () => {
      const other = Dataset.fromRecords([{ key: 1 }]);
      expect(() => merge(left, { other, on: 'id' })).toThrow(JoinKeyMismatchError);
      expect(() => merge(left, { other, on: 'id' })).toThrow('Join key columns are absent: right is missing id');
      expect(() => merge(left, { other, on: ['id', 'key'] })).toThrow(
        'Join key columns are absent: left is missing key; right is missing id'
      );
    });

    it('fails without shared columns', () => {
      expect(() => merge(left, { other: Dataset.fromRecords([{ key: 1 }]) })).toThrow(
        'No shared columns to merge on; pass "on" explicitly'
      );
    });

    it('enforces the requested key cardinality', () => {
      expect(() => merge(left, { other: right, on: 'id', validate: 'one_to_one' })).toThrow(MergeValidationError);
      expect(() => merge(left, { other: right, on: 'id', validate: 'one_to_one' })).toThrow(
        "Merge keys are not unique in the right dataset, violating 'one_to_one'"
      );
      expect(merge(left, { other: right, on: 'id', validate: 'one_to_many' }).rowCount).toBe(3);
    });

    it('requires a Dataset as the other side', () => {
      expect(MergeParamsSchema.safeParse({ other: [{ id: 1 }] }).success).toBe(false);
    });
  });
});
