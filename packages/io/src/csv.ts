/**
 * CSV reading and writing
 *
 * The first record is the header. Without type inference every cell is a
 * string, with empty cells kept as ''.
 */

import { promises as fs } from 'fs';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { Dataset, type Scalar } from '@tabflow/core';
import { FileIOError, ValidationError, createLogger, getCsvConfig } from '@tabflow/utils';
import { inferScalar } from './infer.js';

const log = createLogger('io');

export interface CsvReadOptions {
  /** Defaults to TABFLOW_CSV_DELIMITER, then ',' */
  delimiter?: string;
  /** Defaults to TABFLOW_CSV_INFER_TYPES, then true */
  inferTypes?: boolean;
  /** Recorded as the dataset's provenance source */
  source?: string;
}

export interface CsvWriteOptions {
  delimiter?: string;
}

const CsvRecordsSchema = z.array(z.array(z.string()));

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseCsv(text: string, options: CsvReadOptions = {}): Dataset {
  const config = getCsvConfig();
  const delimiter = options.delimiter ?? config.delimiter;
  const inferTypes = options.inferTypes ?? config.inferTypes;

  let records: string[][];
  try {
    records = CsvRecordsSchema.parse(
      parse(text, {
        delimiter,
        bom: true,
        skip_empty_lines: true,
      })
    );
  } catch (error) {
    throw new ValidationError(`Invalid CSV: ${errorMessage(error)}`, { source: options.source });
  }

  const [header, ...body] = records;
  if (!header) {
    return new Dataset([], [], { source: options.source ?? null });
  }

  const convert = (raw: string): Scalar => (inferTypes ? inferScalar(raw) : raw);
  const rows = body.map((cells) => Object.fromEntries(header.map((column, i) => [column, convert(cells[i] ?? '')])));
  return new Dataset(header, rows, { source: options.source ?? null });
}

export function formatCsv(dataset: Dataset, options: CsvWriteOptions = {}): string {
  const delimiter = options.delimiter ?? getCsvConfig().delimiter;
  const records: Scalar[][] = [
    [...dataset.columns],
    ...dataset.rows.map((row) => dataset.columns.map((column) => row[column] ?? null)),
  ];
  return stringify(records, {
    delimiter,
    cast: { boolean: (value) => (value ? 'true' : 'false') },
  });
}

/**
 * @throws FileIOError if the file cannot be read
 */
export async function loadCsv(filePath: string, options: CsvReadOptions = {}): Promise<Dataset> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileIOError(`Failed to read CSV file: ${errorMessage(error)}`, filePath);
  }
  const dataset = parseCsv(text, { ...options, source: options.source ?? filePath });
  log.info('Loaded CSV', { source: filePath, rows: dataset.rowCount, columns: dataset.columns.length });
  return dataset;
}

export async function saveCsv(filePath: string, dataset: Dataset, options: CsvWriteOptions = {}): Promise<void> {
  try {
    await fs.writeFile(filePath, formatCsv(dataset, options), 'utf-8');
  } catch (error) {
    throw new FileIOError(`Failed to write CSV file: ${errorMessage(error)}`, filePath);
  }
  log.info('Saved CSV', { source: filePath, rows: dataset.rowCount });
}
