/**
 * Property Tests for the built-in operations
 * ==========================================
 *
 * Critical Invariants:
 * 1. sort is stable: tied rows keep their relative order
 * 2. group_aggregate emits one row per distinct grouping tuple
 * 3. an inner merge over unique keys yields at most min(left, right) rows,
 *    and every output row's key appears on both sides
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { Dataset, tupleKey } from '@tabflow/core';
import { sortOperation } from '../../src/sort.js';
import { groupAggregateOperation } from '../../src/group-aggregate.js';
import { MergeParamsSchema, mergeOperation } from '../../src/merge.js';

const key = fc.oneof(fc.integer({ min: 0, max: 4 }), fc.constantFrom('a', 'b', 'c'), fc.constant(null));

describe('Operations - Property Tests', () => {
  it('sort keeps tied rows in input order', () => {
    fc.assert(
      fc.property(fc.array(key, { maxLength: 40 }), fc.constantFrom<'asc' | 'desc'>('asc', 'desc'), (keys, direction) => {
        const dataset = Dataset.fromRecords(keys.map((k, seq) => ({ k, seq })), { columns: ['k', 'seq'] });
        const sorted = sortOperation.apply(dataset, { by: [['k', direction]] }).rows;

        return sorted.every((row, i) => {
          const next = sorted[i + 1];
          if (next === undefined || next['k'] !== row['k']) return true;
          return Number(next['seq']) > Number(row['seq']);
        });
      }),
      { numRuns: 200 }
    );
  });

  it('group_aggregate row count equals distinct key tuples', () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(key, key), { maxLength: 40 }), (pairs) => {
        const dataset = Dataset.fromRecords(pairs.map(([a, b]) => ({ a, b })), { columns: ['a', 'b'] });
        const result = groupAggregateOperation.apply(dataset, { group_by: ['a', 'b'] });
        const distinct = new Set(pairs.map((pair) => tupleKey(pair)));
        const total = result.column('count').reduce<number>((sum, n) => sum + Number(n), 0);
        return result.rowCount === distinct.size && total === pairs.length;
      }),
      { numRuns: 200 }
    );
  });

  it('inner merge over unique keys is bounded and key-consistent', () => {
    const side = fc.uniqueArray(fc.integer({ min: 0, max: 15 }), { maxLength: 12 });
    fc.assert(
      fc.property(side, side, (leftKeys, rightKeys) => {
        const left = Dataset.fromRecords(leftKeys.map((id) => ({ id, l: id * 2 })), { columns: ['id', 'l'] });
        const right = Dataset.fromRecords(rightKeys.map((id) => ({ id, r: `r${id}` })), { columns: ['id', 'r'] });
        const result = mergeOperation.apply(
          left,
          MergeParamsSchema.parse({ other: right, on: 'id', validate: 'one_to_one' })
        );

        const bounded = result.rowCount <= Math.min(left.rowCount, right.rowCount);
        const consistent = result.rows.every((row) => {
          const id = row['id'];
          return (
            leftKeys.some((k) => k === id) &&
            rightKeys.some((k) => k === id) &&
            row['l'] === Number(id) * 2 &&
            row['r'] === `r${String(id)}`
          );
        });
        return bounded && consistent;
      }),
      { numRuns: 200 }
    );
  });
});
