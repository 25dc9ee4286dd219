/**
 * Handler for `tabflow run`
 *
 * Loads the input dataset and the pipeline, runs every step through the
 * engine, then writes the result to a file or renders it for stdout.
 */

import path from 'path';
import { z } from 'zod';
import type { Dataset } from '@tabflow/core';
import { ProcessingEngine } from '@tabflow/engine';
import { loadCsv, loadJson, saveCsv, saveJson } from '@tabflow/io';
import { createLogger } from '@tabflow/utils';
import { readPipelineFile, resolvePipelineSteps } from '../core/pipeline-file.js';
import { formatDataset, type OutputFormat } from '../core/output-formatter.js';

const log = createLogger('cli');

export const RunArgsSchema = z.object({
  input: z.string().min(1),
  pipeline: z.string().min(1),
  output: z.string().min(1).optional(),
  format: z.enum(['csv', 'json']).optional(),
});

export type RunArgs = z.infer<typeof RunArgsSchema>;

export interface RunContext {
  engine?: ProcessingEngine;
}

export interface RunResult {
  dataset: Dataset;
  /** Path the result was written to, if any */
  written: string | null;
  /** Rendered result when no output path was given */
  rendered: string | null;
}

function isJsonPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.json';
}

export async function runPipelineHandler(args: RunArgs, ctx: RunContext = {}): Promise<RunResult> {
  const input = isJsonPath(args.input) ? await loadJson(args.input) : await loadCsv(args.input);
  const pipeline = await readPipelineFile(args.pipeline);
  const engine = ctx.engine ?? new ProcessingEngine();
  const steps = await resolvePipelineSteps(
    pipeline,
    path.dirname(path.resolve(args.pipeline)),
    engine.listOperations()
  );

  const dataset = engine.setData(input).pipeline(steps).getData();
  log.info('Pipeline finished', { source: args.input, steps: steps.length, rowsOut: dataset.rowCount });

  const format: OutputFormat = args.format ?? (args.output && isJsonPath(args.output) ? 'json' : 'csv');
  if (args.output) {
    if (format === 'json') {
      await saveJson(args.output, dataset);
    } else {
      await saveCsv(args.output, dataset);
    }
    return { dataset, written: args.output, rendered: null };
  }
  return { dataset, written: null, rendered: formatDataset(dataset, format) };
}
