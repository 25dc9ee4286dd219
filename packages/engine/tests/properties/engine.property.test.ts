/**
 * Property Tests for ProcessingEngine
 * ===================================
 *
 * Critical Invariants:
 * 1. setData(h).getData() hands back h unchanged
 * 2. A failed apply leaves the current dataset exactly as it was
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { Dataset, OperationError, createFixedClock } from '@tabflow/core';
import { ProcessingEngine } from '../../src/engine.js';
import { createDefaultRegistry } from '../../src/defaults.js';

const clock = createFixedClock('2024-06-30T12:00:00Z');

const rows = fc.array(
  fc.record({
    id: fc.integer({ min: 0, max: 9 }),
    val: fc.oneof(fc.integer({ min: -100, max: 100 }), fc.constant(null)),
    tag: fc.constantFrom('a', 'b', 'c'),
  }),
  { maxLength: 25 }
);

const dataset = rows.map((records) => Dataset.fromRecords(records, { columns: ['id', 'val', 'tag'] }));

const failingRequest = fc.constantFrom<[string, Record<string, unknown>]>(
  ['nonexistent', {}],
  ['filter', { expr: 'missing > 1' }],
  ['filter', { expr: 'val >' }],
  ['filter', {}],
  ['sort', { by: ['nope'] }],
  ['sort', { by: 'val', extra: 1 }],
  ['group_aggregate', { group_by: 'id', agg: { val: 'mode' } }],
  ['group_aggregate', { group_by: 'id', agg: { id: 'sum' } }],
  ['merge', { other: 'not a dataset' }],
  ['select', { columns: ['id', 'id'] }],
  ['limit', { count: -1 }]
);

describe('ProcessingEngine - Property Tests', () => {
  it('round-trips the dataset it is given', () => {
    fc.assert(
      fc.property(dataset, (data) => {
        const back = new ProcessingEngine(createDefaultRegistry(), { clock }).setData(data).getData();
        return back === data && back.equals(data);
      }),
      { numRuns: 100 }
    );
  });

  it('leaves state unchanged when apply fails', () => {
    fc.assert(
      fc.property(dataset, failingRequest, (data, [name, params]) => {
        const engine = new ProcessingEngine(createDefaultRegistry(), { clock }).setData(data);
        const before = data.toRecords();
        try {
          engine.apply(name, params);
          return false;
        } catch (error) {
          const current = engine.getData();
          return (
            error instanceof OperationError &&
            current === data &&
            JSON.stringify(current.toRecords()) === JSON.stringify(before)
          );
        }
      }),
      { numRuns: 200 }
    );
  });
});
