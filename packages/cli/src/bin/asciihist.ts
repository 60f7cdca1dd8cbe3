#!/usr/bin/env -S node --import tsx

/**
 * asciihist CLI Entry Point
 *
 * Reads numbers (one per line) from a file or stdin and prints a histogram.
 */

import { program } from 'commander';
import { logger } from '@asciihist/utils';
import { registerHistogramCommand } from '../commands/histogram.js';
import { ExitCode, exitCodeFor, handleError } from '../core/error-handler.js';

program
  .name('asciihist')
  .description('Terminal histogram of a stream of numbers')
  .version('1.0.0');

registerHistogramCommand(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    // Option parsers (coerceNumber) throw before the action runs
    const message = handleError(error, { stage: 'parse' });
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = exitCodeFor(error);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exitCode = ExitCode.UNEXPECTED;
});

export { program };
