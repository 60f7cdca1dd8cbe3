/**
 * Handler for the histogram command.
 * Reads the input, builds the report and works out how it should be drawn.
 */

import {
  availableBarWidth,
  buildReport,
  reportRows,
  validateBinCount,
  type RenderOptions,
  type Report,
} from '@asciihist/core';
import { createPackageLogger, LogHelpers } from '@asciihist/utils';
import type { CommandContext } from '../../core/command-context.js';
import { describeInputSource, resolveInputSource } from '../../core/input-source.js';
import type { HistogramArgs } from '../../command-defs/histogram.js';

const logger = createPackageLogger('@asciihist/cli');

/** Rows taken by the header, the blank separator and the shell prompt */
const RESERVED_ROWS = 9;

export interface HistogramResult {
  report: Report;
  renderOptions: RenderOptions;
}

export async function renderHistogramHandler(
  args: HistogramArgs,
  ctx: CommandContext
): Promise<HistogramResult> {
  const display = ctx.displayConfig();

  // Reject a bad bin count before any input is consumed
  const binCount = args.bins ?? display.bins;
  if (binCount !== undefined) {
    validateBinCount(binCount);
  }

  const source = resolveInputSource(args.file);
  const started = Date.now();
  const lines = await ctx.readLines(source, args.maxLines);
  LogHelpers.performance(logger, 'read-input', Date.now() - started, true, {
    source: describeInputSource(source),
    lines: lines.length,
  });

  const terminal = ctx.terminalSize();
  const report = buildReport(lines, {
    mode: args.mode,
    strict: args.strict,
    extract: args.extract,
    maxLines: args.maxLines,
    binCount,
    strategy: args.binStrategy ?? display.binStrategy,
    maxBins: Math.max(1, terminal.rows - RESERVED_ROWS),
  });

  if (report.kind === 'numeric') {
    LogHelpers.inputRead(logger, describeInputSource(source), report.stats.count, report.skipped, {
      invalid: report.invalid,
    });
  }

  const rows = reportRows(report, args.precision);
  const labelWidth = Math.max(0, ...rows.map((row) => row.label.length));
  const countWidth = Math.max(0, ...rows.map((row) => String(row.count).length));

  return {
    report,
    renderOptions: {
      width: args.width ?? display.width ?? availableBarWidth(terminal.columns, labelWidth, countWidth),
      glyph: args.glyph ?? display.glyph,
      precision: args.precision,
      preserveNonZero: args.preserveNonzero,
    },
  };
}
