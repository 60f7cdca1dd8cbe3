/**
 * Report Builder
 *
 * Accumulator -> quartiles -> bin count -> Binner, as one pure step.
 */

import { resolveBinCount } from './binning/bin-count.js';
import { binSamples, createBinSpec } from './binning/binner.js';
import { countCategories } from './categories/category-counter.js';
import { EmptyInputError } from './errors.js';
import { collectSamples, isMostlyNonNumeric } from './samples/collect-samples.js';
import type { CollectedSamples } from './samples/collect-samples.js';
import { DEFAULT_MAX_LINES, type InputMode, type ReadOptions } from './schemas.js';
import { StatisticsAccumulator } from './stats/accumulator.js';
import { quartiles } from './stats/quartiles.js';
import type { BinCountOptions, HistogramReport, Report } from './types.js';

export interface BuildReportOptions extends BinCountOptions, ReadOptions {
  mode?: InputMode;
}

/**
 * Build a numeric histogram report from collected samples.
 *
 * @throws EmptyInputError when no samples were collected
 * @throws InvalidBinCountError when binCount or maxBins is not a positive integer
 */
export function buildHistogramReport(
  collected: Pick<CollectedSamples, 'samples' | 'skipped'> & Partial<Pick<CollectedSamples, 'invalid'>>,
  options: BinCountOptions = {}
): HistogramReport {
  const { samples, skipped, invalid = [] } = collected;
  if (samples.length === 0) {
    throw new EmptyInputError(skipped);
  }

  const stats = new StatisticsAccumulator().observeAll(samples).finalize();
  const range = { min: stats.min, max: stats.max };
  const k = resolveBinCount(options, stats.count);

  return {
    kind: 'numeric',
    stats,
    quartiles: quartiles(samples),
    binSpec: createBinSpec(range, k),
    bins: binSamples(samples, range, k),
    skipped,
    invalid,
  };
}

/**
 * Build the report for raw input lines in the requested mode.
 *
 * `auto` picks the categorical chart when most non-blank lines are not
 * numbers, or when there are fewer distinct values than bins; otherwise the
 * numeric histogram. Only the first `maxLines` lines are considered.
 */
export function buildReport(lines: readonly string[], options: BuildReportOptions = {}): Report {
  const { mode = 'numeric', ...rest } = options;
  const capped = lines.slice(0, rest.maxLines ?? DEFAULT_MAX_LINES);

  if (
    mode === 'categorical' ||
    (mode === 'auto' && isMostlyNonNumeric(capped, { extract: rest.extract }))
  ) {
    return countCategories(capped);
  }

  const collected = collectSamples(capped, rest);
  if (mode === 'auto' && collected.samples.length > 0) {
    const distinct = new Set(collected.samples).size;
    if (distinct < resolveBinCount(rest, collected.samples.length)) {
      return countCategories(capped);
    }
  }

  return buildHistogramReport(collected, rest);
}
