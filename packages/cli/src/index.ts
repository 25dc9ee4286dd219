/**
 * @tabflow/cli
 */

export { createProgram } from './program.js';
export { runPipelineHandler, RunArgsSchema, type RunArgs, type RunContext, type RunResult } from './handlers/run-pipeline.js';
export { listOperationsHandler } from './handlers/list-operations.js';
export {
  PipelineFileSchema,
  PipelineStepSchema,
  DatasetReferenceSchema,
  parsePipeline,
  readPipelineFile,
  resolvePipelineSteps,
  type PipelineFile,
  type DatasetReference,
} from './core/pipeline-file.js';
export { formatDataset, formatOperations, type OutputFormat } from './core/output-formatter.js';
export { parseArguments } from './core/argument-parser.js';
