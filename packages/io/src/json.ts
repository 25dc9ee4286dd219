/**
 * JSON datasets: an array of flat records whose values are scalars
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { Dataset, ScalarSchema } from '@tabflow/core';
import { FileIOError, ValidationError, createLogger } from '@tabflow/utils';

const log = createLogger('io');

export const JsonRecordsSchema = z.array(z.record(ScalarSchema));

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseJson(text: string, source?: string): Dataset {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Invalid JSON: ${errorMessage(error)}`, { source });
  }

  const parsed = JsonRecordsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(`Expected an array of flat records${where}: ${issue?.message ?? 'invalid'}`, {
      source,
    });
  }
  return Dataset.fromRecords(parsed.data, { source });
}

export function formatJson(dataset: Dataset): string {
  return `${JSON.stringify(dataset.toRecords(), null, 2)}\n`;
}

/**
 * @throws FileIOError if the file cannot be read
 */
export async function loadJson(filePath: string): Promise<Dataset> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileIOError(`Failed to read JSON file: ${errorMessage(error)}`, filePath);
  }
  const dataset = parseJson(text, filePath);
  log.info('Loaded JSON', { source: filePath, rows: dataset.rowCount, columns: dataset.columns.length });
  return dataset;
}

export async function saveJson(filePath: string, dataset: Dataset): Promise<void> {
  try {
    await fs.writeFile(filePath, formatJson(dataset), 'utf-8');
  } catch (error) {
    throw new FileIOError(`Failed to write JSON file: ${errorMessage(error)}`, filePath);
  }
  log.info('Saved JSON', { source: filePath, rows: dataset.rowCount });
}
