#!/usr/bin/env node

/**
 * tabflow CLI entry point
 */

import { handleError, logger } from '@tabflow/utils';
import { createProgram } from '../program.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const result = handleError(error);
    process.stderr.write(`Error: ${result.message}\n`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});
