import { describe, it, expect } from 'vitest';
import { Dataset, InvalidDatasetError } from '@tabflow/core';
import { ValidationError } from '@tabflow/utils';
import { formatCsv, parseCsv } from '../../src/csv.js';

describe('parseCsv', () => {
  it('infers scalar types', () => {
    const dataset = parseCsv('id,val,flag,name\n1,10,true,a\n2,,false,"b, c"\n', { source: 'inline' });
    expect(dataset.columns).toEqual(['id', 'val', 'flag', 'name']);
    expect(dataset.toRecords()).toEqual([
      { id: 1, val: 10, flag: true, name: 'a' },
      { id: 2, val: null, flag: false, name: 'b, c' },
    ]);
    expect(dataset.provenance.source).toBe('inline');
  });

  it('keeps raw text when inference is off', () => {
    const dataset = parseCsv('id,val\n1,\n', { inferTypes: false });
    expect(dataset.toRecords()).toEqual([{ id: '1', val: '' }]);
  });

  it('honours a custom delimiter', () => {
    expect(parseCsv('a;b\n1;x\n', { delimiter: ';' }).toRecords()).toEqual([{ a: 1, b: 'x' }]);
  });

  it('handles a header without rows and an empty input', () => {
    const headerOnly = parseCsv('a,b\n');
    expect(headerOnly.columns).toEqual(['a', 'b']);
    expect(headerOnly.rowCount).toBe(0);
    expect(parseCsv('').columns).toEqual([]);
  });

  it('rejects ragged rows and duplicate headers', () => {
    expect(() => parseCsv('a,b\n1,2,3\n')).toThrow(ValidationError);
    expect(() => parseCsv('a,b\n1,2,3\n')).toThrow(/^Invalid CSV: /);
    expect(() => parseCsv('a,a\n1,2\n')).toThrow(InvalidDatasetError);
  });
});

describe('formatCsv', () => {
  it('writes a header, quoted fields, booleans and empty nulls', () => {
    const dataset = Dataset.fromRecords([{ id: 1, name: 'x, y', ok: true, note: null }]);
    expect(formatCsv(dataset)).toBe('id,name,ok,note\n1,"x, y",true,\n');
  });

  it('writes only the header for an empty dataset', () => {
    expect(formatCsv(Dataset.empty(['a', 'b']))).toBe('a,b\n');
  });

  it('uses a custom delimiter', () => {
    expect(formatCsv(Dataset.fromRecords([{ a: 1, b: 2 }]), { delimiter: ';' })).toBe('a;b\n1;2\n');
  });

  it('reads back what it writes', () => {
    const dataset = Dataset.fromRecords([
      { id: 1, price: 2.5, label: 'plain', active: false, note: null },
      { id: 2, price: -1, label: 'with "quotes"', active: true, note: 'multi\nline' },
    ]);
    expect(parseCsv(formatCsv(dataset)).equals(dataset)).toBe(true);
  });
});
