import type { Command } from 'commander';
import { listOperationsHandler } from '../handlers/list-operations.js';
import { formatOperations } from '../core/output-formatter.js';

export function registerOperationsCommand(program: Command): void {
  program
    .command('operations')
    .description('List registered operations and their parameters')
    .option('--json', 'Print descriptors as JSON')
    .action((options: { json?: boolean }) => {
      const operations = listOperationsHandler();
      process.stdout.write(
        options.json ? `${JSON.stringify(operations, null, 2)}\n` : formatOperations(operations)
      );
    });
}
