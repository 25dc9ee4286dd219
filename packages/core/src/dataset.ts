/**
 * Dataset Handle
 * ==============
 * Immutable two-dimensional labeled table plus provenance metadata.
 *
 * Invariants:
 * - column names are unique and ordered
 * - every row has exactly the declared columns, each holding a Scalar
 * - columns and rows never change after construction; transformations
 *   produce a new Dataset through the `with*` constructors
 */

import { z } from 'zod';
import { InvalidDatasetError, UnknownColumnError } from './errors.js';
import { isScalar, type Scalar } from './types/scalar.js';

export type Row = Readonly<Record<string, Scalar>>;

export interface Provenance {
  /** Where the data entered the system (file path, API name, ...) */
  readonly source: string | null;
  /** Name of the last operation that produced this handle */
  readonly lastOperation: string | null;
  /** ISO timestamp at which lastOperation was applied */
  readonly appliedAt: string | null;
}

export interface FromRecordsOptions {
  /** Explicit column order; keys outside it are rejected */
  columns?: readonly string[];
  source?: string;
}

const EMPTY_PROVENANCE: Provenance = Object.freeze({
  source: null,
  lastOperation: null,
  appliedAt: null,
});

function describeValue(value: unknown): string {
  if (typeof value === 'number') return String(value);
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export class Dataset {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
  readonly provenance: Provenance;

  constructor(
    columns: readonly string[],
    rows: ReadonlyArray<Readonly<Record<string, unknown>>>,
    provenance: Partial<Provenance> = {}
  ) {
    const seen = new Set<string>();
    for (const column of columns) {
      if (seen.has(column)) {
        throw new InvalidDatasetError(`Duplicate column '${column}'`, { column });
      }
      seen.add(column);
    }

    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map((row, index) => Dataset.normalizeRow(this.columns, row, index)));
    this.provenance = Object.freeze({ ...EMPTY_PROVENANCE, ...provenance });
  }

  /**
   * Build a dataset from plain records.
   *
   * Without explicit columns, the column order is the order in which keys are
   * first seen across the records. Keys a record lacks are filled with null.
   */
  static fromRecords(
    records: ReadonlyArray<Readonly<Record<string, unknown>>>,
    options: FromRecordsOptions = {}
  ): Dataset {
    let columns: readonly string[];
    if (options.columns) {
      columns = options.columns;
    } else {
      const ordered = new Set<string>();
      for (const record of records) {
        for (const key of Object.keys(record)) ordered.add(key);
      }
      columns = [...ordered];
    }

    const known = new Set(columns);
    const rows = records.map((record, index) => {
      for (const key of Object.keys(record)) {
        if (!known.has(key)) {
          throw new InvalidDatasetError(`Row ${index} has column '${key}' outside the declared columns`, {
            row: index,
            column: key,
          });
        }
      }
      return Object.fromEntries(
        columns.map((column) => {
          const value = Object.prototype.hasOwnProperty.call(record, column) ? record[column] : undefined;
          return [column, value === undefined ? null : value];
        })
      );
    });

    return new Dataset(columns, rows, { source: options.source ?? null });
  }

  static empty(columns: readonly string[] = []): Dataset {
    return new Dataset(columns, []);
  }

  private static normalizeRow(
    columns: readonly string[],
    row: Readonly<Record<string, unknown>>,
    index: number
  ): Row {
    const keys = Object.keys(row);
    if (keys.length !== columns.length) {
      throw new InvalidDatasetError(
        `Row ${index} has ${keys.length} columns, expected ${columns.length}`,
        { row: index, columns: [...columns], keys }
      );
    }

    const entries: Array<[string, Scalar]> = [];
    for (const column of columns) {
      if (!Object.prototype.hasOwnProperty.call(row, column)) {
        throw new InvalidDatasetError(`Row ${index} is missing column '${column}'`, {
          row: index,
          column,
        });
      }
      const value = row[column];
      if (!isScalar(value)) {
        throw new InvalidDatasetError(
          `Row ${index}, column '${column}' holds a non-scalar value (${describeValue(value)})`,
          { row: index, column }
        );
      }
      entries.push([column, value]);
    }
    // fromEntries defines own properties, so a column named __proto__ stays a column
    return Object.freeze(Object.fromEntries(entries));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /**
   * New handle with the same columns and provenance, different rows
   */
  withRows(rows: ReadonlyArray<Readonly<Record<string, unknown>>>): Dataset {
    return new Dataset(this.columns, rows, this.provenance);
  }

  /**
   * New handle with different columns and rows, same provenance
   */
  withColumns(columns: readonly string[], rows: ReadonlyArray<Readonly<Record<string, unknown>>>): Dataset {
    return new Dataset(columns, rows, this.provenance);
  }

  withProvenance(patch: Partial<Provenance>): Dataset {
    return new Dataset(this.columns, this.rows, { ...this.provenance, ...patch });
  }

  hasColumn(name: string): boolean {
    return this.columns.includes(name);
  }

  /**
   * @throws UnknownColumnError for the first name that is not a column
   */
  requireColumns(names: Iterable<string>): void {
    for (const name of names) {
      if (!this.hasColumn(name)) {
        throw new UnknownColumnError(name, this.columns);
      }
    }
  }

  column(name: string): Scalar[] {
    this.requireColumns([name]);
    return this.rows.map((row) => row[name] ?? null);
  }

  /**
   * Plain, mutable copies of the rows
   */
  toRecords(): Record<string, Scalar>[] {
    return this.rows.map((row) => ({ ...row }));
  }

  equals(other: Dataset): boolean {
    if (this.columns.length !== other.columns.length || this.rowCount !== other.rowCount) {
      return false;
    }
    if (this.columns.some((column, i) => column !== other.columns[i])) {
      return false;
    }
    return this.rows.every((row, i) => {
      const otherRow = other.rows[i];
      return this.columns.every((column) => row[column] === otherRow?.[column]);
    });
  }
}

/**
 * Parameter schema for operations that take a second dataset
 */
export const DatasetSchema = z.instanceof(Dataset, { message: 'Expected a Dataset' });
