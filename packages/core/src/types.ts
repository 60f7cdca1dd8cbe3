/**
 * Domain types for the histogram engine
 */

import type { BinStrategy } from './schemas.js';

/**
 * Finite numeric range of a sample set. Invariant: min <= max.
 */
export interface Range {
  readonly min: number;
  readonly max: number;
}

export interface BinSpec {
  /** Number of bins, k >= 1 */
  readonly count: number;
  /** (max - min) / k; 0 for a degenerate range or a span that underflows */
  readonly width: number;
}

/**
 * One bin. All bins are `[lower, upper)` except the last, which is closed
 * (`closed: true`) so that `max` is counted.
 */
export interface Bin {
  readonly index: number;
  readonly lower: number;
  readonly upper: number;
  readonly count: number;
  readonly closed: boolean;
}

export interface SummaryStats {
  readonly count: number;
  readonly sum: number;
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  /** Population standard deviation */
  readonly stddev: number;
}

export interface Quartiles {
  readonly p25: number;
  readonly p50: number;
  readonly p75: number;
}

export interface InvalidLine {
  /** 1-based */
  readonly lineNumber: number;
  readonly line: string;
  readonly reason: string;
}

export interface HistogramReport {
  readonly kind: 'numeric';
  readonly stats: SummaryStats;
  readonly quartiles: Quartiles;
  readonly binSpec: BinSpec;
  readonly bins: readonly Bin[];
  /** Malformed lines skipped while reading */
  readonly skipped: number;
  /** The first few skipped lines, for diagnostics */
  readonly invalid: readonly InvalidLine[];
}

export interface CategoryCount {
  readonly label: string;
  readonly count: number;
}

export interface CategoryReport {
  readonly kind: 'categorical';
  readonly total: number;
  readonly categories: readonly CategoryCount[];
  readonly skipped: number;
}

export type Report = HistogramReport | CategoryReport;

export interface BinCountOptions {
  /** Explicit bin count; wins over auto selection */
  binCount?: number;
  strategy?: BinStrategy;
  /** Upper bound applied to auto-selected counts (e.g. terminal rows) */
  maxBins?: number;
}
