import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  Dataset,
  DuplicateOperationError,
  ParameterValidationError,
  UnknownOperationError,
  type Operation,
} from '@tabflow/core';
import { ValidationError } from '@tabflow/utils';
import { OperationRegistry } from '../../src/registry.js';
import { createDefaultRegistry } from '../../src/defaults.js';

const ScaleSchema = z.object({
  column: z.string(),
  factor: z.number().default(2),
});

const scale: Operation<z.infer<typeof ScaleSchema>> = {
  description: 'Multiply a numeric column',
  apply(dataset, { column, factor }) {
    return dataset.withRows(
      dataset.rows.map((row) => {
        const value = row[column];
        return { ...row, [column]: typeof value === 'number' ? value * factor : value };
      })
    );
  },
};

describe('OperationRegistry', () => {
  it('registers and resolves operations', () => {
    const registry = new OperationRegistry().register('scale', scale, ScaleSchema);
    const entry = registry.resolve('scale');

    expect(entry.name).toBe('scale');
    expect(entry.description).toBe('Multiply a numeric column');
    expect(registry.has('scale')).toBe(true);
  });

  it('binds validated parameters with defaults filled in', () => {
    const registry = new OperationRegistry().register('scale', scale, ScaleSchema);
    const bound = registry.resolve('scale').bind({ column: 'v' });

    expect(bound.params).toEqual({ column: 'v', factor: 2 });
    const result = bound.apply(Dataset.fromRecords([{ v: 3 }]));
    expect(result).toBeInstanceOf(Dataset);
    expect(result instanceof Dataset && result.toRecords()).toEqual([{ v: 6 }]);
  });

  it('rejects missing, mistyped and unknown parameters', () => {
    const entry = new OperationRegistry().register('scale', scale, ScaleSchema).resolve('scale');

    expect(() => entry.bind({})).toThrow(ParameterValidationError);
    expect(() => entry.bind({})).toThrow("Invalid parameters for 'scale': column: Required");
    expect(() => entry.bind({ column: 1 })).toThrow("column: Expected string, received number");
    expect(() => entry.bind({ column: 'v', extra: true })).toThrow(
      "Invalid parameters for 'scale': Unrecognized key(s) in object: 'extra'"
    );
  });

  it('fails to resolve unknown names, listing what is available', () => {
    const registry = new OperationRegistry().register('scale', scale, ScaleSchema);

    expect(() => registry.resolve('nonexistent')).toThrow(UnknownOperationError);
    expect(() => registry.resolve('nonexistent')).toThrow(
      "Operation 'nonexistent' is not registered. Available: scale"
    );
    expect(() => new OperationRegistry().resolve('x')).toThrow('Available: (none)');
  });

  it('rejects duplicate names unless overriding', () => {
    const registry = new OperationRegistry().register('scale', scale, ScaleSchema);
    const replacement: Operation<z.infer<typeof ScaleSchema>> = {
      description: 'Replacement',
      apply: (dataset) => dataset,
    };

    expect(() => registry.register('scale', replacement, ScaleSchema)).toThrow(DuplicateOperationError);
    registry.register('scale', replacement, ScaleSchema, { override: true });
    expect(registry.resolve('scale').description).toBe('Replacement');
  });

  it('validates registrations', () => {
    const registry = new OperationRegistry();
    expect(() => registry.register(' ', scale, ScaleSchema)).toThrow(ValidationError);
  });

  it('unregisters operations', () => {
    const registry = new OperationRegistry().register('scale', scale, ScaleSchema);
    expect(registry.unregister('scale')).toBe(true);
    expect(registry.unregister('scale')).toBe(false);
    expect(registry.listNames()).toEqual([]);
  });

  it('describes parameters in declaration order', () => {
    const registry = new OperationRegistry().register('scale', scale, ScaleSchema);
    expect(registry.describe('scale')).toEqual({
      name: 'scale',
      description: 'Multiply a numeric column',
      parameters: [
        { name: 'column', type: 'string', required: true },
        { name: 'factor', type: 'number', required: false, default: 2 },
      ],
    });
  });

  describe('createDefaultRegistry', () => {
    it('registers every built-in operation', () => {
      expect(createDefaultRegistry().listNames()).toEqual([
        'drop_columns',
        'drop_duplicates',
        'fill_missing',
        'filter',
        'group_aggregate',
        'limit',
        'merge',
        'rename',
        'select',
        'sort',
      ]);
    });

    it('describes the merge parameters', () => {
      const merge = createDefaultRegistry().describe('merge');
      expect(merge.parameters.map((parameter) => [parameter.name, parameter.type, parameter.required])).toEqual([
        ['other', 'Dataset', true],
        ['on', 'string | string[]', false],
        ['how', '"inner" | "left" | "right" | "outer"', false],
        ['suffixes', '[string, string]', false],
        ['validate', '"one_to_one" | "one_to_many" | "many_to_one" | "many_to_many"', false],
      ]);
    });
  });
});
