/**
 * Histogram Command
 */

import type { Command } from 'commander';
import { coerceNumber } from '../core/coerce.js';
import { executeHistogram, type ExecuteOptions } from '../core/execute.js';

/**
 * Register the histogram options on the root program and wire the action to
 * executeHistogram(). The exit code is stored on process.exitCode so pending
 * output is flushed before the process ends.
 */
export function registerHistogramCommand(program: Command, options: ExecuteOptions = {}): Command {
  return program
    .argument('[file]', 'Input file (reads stdin when omitted or "-")')
    .option('-b, --bins <n>', 'Number of bins (overrides auto selection)', (v) =>
      coerceNumber(v, 'bins')
    )
    .option('--bin-strategy <strategy>', 'Auto bin rule: sturges, sqrt, rice')
    .option('-w, --width <n>', 'Maximum bar width in columns', (v) => coerceNumber(v, 'width'))
    .option('--strict', 'Abort on the first malformed line', false)
    .option('--extract', 'Use the first number found in each line', false)
    .option('--mode <mode>', 'Input mode: numeric, categorical, auto', 'numeric')
    .option('--glyph <char>', 'Bar glyph')
    .option('--precision <n>', 'Decimals for labels and statistics', (v) =>
      coerceNumber(v, 'precision')
    )
    .option('--max-lines <n>', 'Stop reading after n lines', (v) => coerceNumber(v, 'max-lines'))
    .option('--no-preserve-nonzero', 'Allow non-zero bins to round down to an empty bar')
    .option('--format <format>', 'Output format: table, json', 'table')
    .option('-v, --verbose', 'Debug logging on stderr', false)
    .action(async (file: string | undefined, opts: Record<string, unknown>) => {
      process.exitCode = await executeHistogram({ ...opts, file }, options);
    });
}
