import type { Command } from 'commander';
import { parseArguments } from '../core/argument-parser.js';
import { RunArgsSchema, runPipelineHandler } from '../handlers/run-pipeline.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Apply a pipeline of operations to a dataset')
    .requiredOption('--input <path>', 'Input dataset (.csv or .json)')
    .requiredOption('--pipeline <path>', 'Pipeline file (JSON)')
    .option('--output <path>', 'Write the result here instead of stdout')
    .option('--format <format>', 'Output format: csv or json')
    .action(async (options: Record<string, unknown>) => {
      const args = parseArguments(RunArgsSchema, options);
      const result = await runPipelineHandler(args);
      if (result.rendered !== null) {
        process.stdout.write(result.rendered);
      } else {
        process.stderr.write(`Wrote ${result.dataset.rowCount} rows to ${result.written ?? ''}\n`);
      }
    });
}
