/**
 * Histogram Renderer
 *
 * Turns a finished report into terminal text: a statistics header followed
 * by one row per bin, in ascending order. Pure; never throws.
 */

import {
  RenderOptionsSchema,
  type RenderOptions,
  type ResolvedRenderOptions,
} from '../schemas.js';
import type { Bin, CategoryReport, HistogramReport, Report } from '../types.js';
import { scaleCounts } from './scaler.js';

export interface ChartRow {
  label: string;
  count: number;
}

function resolveOptions(options: RenderOptions): ResolvedRenderOptions {
  const parsed = RenderOptionsSchema.safeParse(options);
  // Rendering is best-effort: bad options fall back to the defaults
  return parsed.success ? parsed.data : RenderOptionsSchema.parse({});
}

export function formatValue(value: number, precision: number): string {
  const text = value.toFixed(precision);
  // toFixed keeps the sign of values that round to zero ("-0.00")
  return /^-0\.?0*$/.test(text) ? text.slice(1) : text;
}

/**
 * Interval label for a bin, e.g. "[1.00, 1.80)" or "[4.20, 5.00]"
 */
export function formatBinLabel(bin: Bin, precision: number): string {
  const close = bin.closed ? ']' : ')';
  return `[${formatValue(bin.lower, precision)}, ${formatValue(bin.upper, precision)}${close}`;
}

function renderHeader(entries: Array<[string, string]>): string[] {
  const labelWidth = Math.max(...entries.map(([label]) => label.length));
  return entries.map(([label, value]) => `${`${label}:`.padEnd(labelWidth + 2)}${value}`);
}

function renderRows(rows: readonly ChartRow[], options: ResolvedRenderOptions): string[] {
  const labelWidth = Math.max(0, ...rows.map((row) => row.label.length));
  const lengths = scaleCounts(
    rows.map((row) => row.count),
    options.width,
    { preserveNonZero: options.preserveNonZero }
  );

  return rows.map((row, i) => {
    const bar = options.glyph.repeat(lengths[i]);
    return `${row.label.padEnd(labelWidth)} │${bar} ${row.count}`;
  });
}

/**
 * Bins as rows. A degenerate range shows only the populated interval.
 */
export function histogramRows(report: HistogramReport, precision: number): ChartRow[] {
  const { min, max } = report.stats;
  if (min === max) {
    return [
      {
        label: `[${formatValue(min, precision)}, ${formatValue(max, precision)}]`,
        count: report.stats.count,
      },
    ];
  }
  return report.bins.map((bin) => ({ label: formatBinLabel(bin, precision), count: bin.count }));
}

/**
 * Chart rows for either kind of report
 */
export function reportRows(report: Report, precision: number): ChartRow[] {
  return report.kind === 'numeric' ? histogramRows(report, precision) : [...report.categories];
}

export function renderHistogram(report: HistogramReport, options: RenderOptions = {}): string {
  const resolved = resolveOptions(options);
  const { precision } = resolved;
  const { stats, quartiles } = report;

  const header: Array<[string, string]> = [
    ['count', String(stats.count)],
    ['min', formatValue(stats.min, precision)],
    ['max', formatValue(stats.max, precision)],
    ['mean', formatValue(stats.mean, precision)],
    ['stddev', formatValue(stats.stddev, precision)],
    [
      'p25/p50/p75',
      [quartiles.p25, quartiles.p50, quartiles.p75]
        .map((q) => formatValue(q, precision))
        .join(' / '),
    ],
  ];
  if (report.skipped > 0) {
    header.push(['skipped', String(report.skipped)]);
  }

  return [
    ...renderHeader(header),
    '',
    ...renderRows(histogramRows(report, precision), resolved),
  ].join('\n');
}

export function renderCategories(report: CategoryReport, options: RenderOptions = {}): string {
  const resolved = resolveOptions(options);
  const header = renderHeader([
    ['count', String(report.total)],
    ['distinct', String(report.categories.length)],
  ]);
  return [...header, '', ...renderRows(report.categories, resolved)].join('\n');
}

export function renderReport(report: Report, options: RenderOptions = {}): string {
  return report.kind === 'numeric'
    ? renderHistogram(report, options)
    : renderCategories(report, options);
}
