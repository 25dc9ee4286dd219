import { Command } from 'commander';
import { registerOperationsCommand } from './commands/operations.js';
import { registerRunCommand } from './commands/run.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('tabflow')
    .description('tabflow CLI - apply named operations to tabular data')
    .version('1.0.0');

  registerOperationsCommand(program);
  registerRunCommand(program);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });
  return program;
}
