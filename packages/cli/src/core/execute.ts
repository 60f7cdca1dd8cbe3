/**
 * Command Executor
 *
 * Handles the universal steps around a handler:
 * - Normalize options
 * - Parse arguments (Zod validation)
 * - Call handler
 * - Format and write output
 * - Map errors to exit codes
 */

import { LogLevel, setLogLevel } from '@asciihist/utils';
import { histogramSchema } from '../command-defs/histogram.js';
import { renderHistogramHandler } from '../handlers/histogram/render-histogram.js';
import { normalizeOptions, parseArguments } from './argument-parser.js';
import { CommandContext } from './command-context.js';
import { ExitCode, exitCodeFor, handleError } from './error-handler.js';
import { formatOutput } from './output-formatter.js';

export interface ExecuteOptions {
  ctx?: CommandContext;
  /** Where fatal messages go (stderr by default) */
  writeErr?: (text: string) => void;
}

/**
 * Run the histogram command for raw Commander options and return the exit
 * code. Never throws: failures are reported on the error stream.
 */
export async function executeHistogram(
  rawOptions: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<ExitCode> {
  const ctx = options.ctx ?? new CommandContext();
  const writeErr = options.writeErr ?? ((text: string) => void process.stderr.write(text));

  try {
    const args = parseArguments(histogramSchema, normalizeOptions(rawOptions));
    if (args.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }

    const { report, renderOptions } = await renderHistogramHandler(args, ctx);
    ctx.write(formatOutput(report, args.format, renderOptions));
    return ExitCode.SUCCESS;
  } catch (error) {
    const message = handleError(error, { command: 'histogram' });
    writeErr(`Error: ${message}\n`);
    return exitCodeFor(error);
  }
}
