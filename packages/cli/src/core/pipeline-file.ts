/**
 * Pipeline files
 *
 * {
 *   "steps": [
 *     { "operation": "filter", "params": { "expr": "amount > 10" } },
 *     { "operation": "merge", "params": { "other": { "csv": "regions.csv" }, "on": "region" } }
 *   ]
 * }
 *
 * For a parameter declared as a Dataset (merge's `other`), a value of the form
 * { "csv": path } or { "json": path } is loaded, with relative paths resolved
 * against the pipeline file. Other parameters pass through untouched.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Dataset, OperationDescriptor } from '@tabflow/core';
import type { PipelineStep } from '@tabflow/engine';
import { loadCsv, loadJson } from '@tabflow/io';
import { FileIOError, ValidationError } from '@tabflow/utils';

export const PipelineStepSchema = z.object({
  operation: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export const PipelineFileSchema = z.object({
  steps: z.array(PipelineStepSchema),
});

export type PipelineFile = z.infer<typeof PipelineFileSchema>;

export const DatasetReferenceSchema = z.union([
  z.object({ csv: z.string().min(1) }).strict(),
  z.object({ json: z.string().min(1) }).strict(),
]);

export type DatasetReference = z.infer<typeof DatasetReferenceSchema>;

/**
 * @throws FileIOError if the file cannot be read
 * @throws ValidationError if it is not a valid pipeline
 */
export async function readPipelineFile(filePath: string): Promise<PipelineFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileIOError(
      `Failed to read pipeline file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  return parsePipeline(text, filePath);
}

export function parsePipeline(text: string, source = 'pipeline'): PipelineFile {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Pipeline ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { source }
    );
  }

  const parsed = PipelineFileSchema.safeParse(raw);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => `  ${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid pipeline ${source}:\n${messages.join('\n')}`, {
      source,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

async function loadReference(reference: DatasetReference, baseDir: string): Promise<Dataset> {
  if ('csv' in reference) {
    return loadCsv(path.resolve(baseDir, reference.csv));
  }
  return loadJson(path.resolve(baseDir, reference.json));
}

function datasetParameters(operations: readonly OperationDescriptor[]): Map<string, Set<string>> {
  return new Map(
    operations.map((operation): [string, Set<string>] => [
      operation.name,
      new Set(operation.parameters.filter((parameter) => parameter.type === 'Dataset').map((parameter) => parameter.name)),
    ])
  );
}

/**
 * Replace dataset references in each step's Dataset parameters with loaded datasets
 */
export async function resolvePipelineSteps(
  pipeline: PipelineFile,
  baseDir: string,
  operations: readonly OperationDescriptor[]
): Promise<PipelineStep[]> {
  const datasetParams = datasetParameters(operations);
  const steps: PipelineStep[] = [];
  for (const step of pipeline.steps) {
    const accepted = datasetParams.get(step.operation);
    const params: Record<string, unknown> = {};
    for (const [name, value] of Object.entries(step.params)) {
      const reference = accepted?.has(name) ? DatasetReferenceSchema.safeParse(value) : null;
      params[name] = reference !== null && reference.success ? await loadReference(reference.data, baseDir) : value;
    }
    steps.push({ operation: step.operation, params });
  }
  return steps;
}
