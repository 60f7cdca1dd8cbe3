/**
 * Binner
 *
 * Uniform bins over [min, max]. Bin i covers [edge(i), edge(i + 1)) with
 * edge(i) = min + (i / k) * (max - min); the last bin is closed at max.
 * Assignment depends only on the value, so the result is independent of
 * sample order.
 *
 * Any two finite doubles are accepted. When max - min overflows, offsets are
 * taken on halved operands; a span that underflows (e.g. [0, 5e-324]) still
 * counts as a real range because degeneracy is decided on min === max.
 */

import type { Bin, BinSpec, Range } from '../types.js';
import { validateBinCount } from './bin-count.js';

/**
 * Range of a non-empty sample set
 */
export function rangeOf(samples: readonly number[]): Range {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const x of samples) {
    if (x < min) min = x;
    if (x > max) max = x;
  }
  return { min, max };
}

export function isDegenerate(range: Range): boolean {
  return range.min === range.max;
}

/**
 * min + t * (max - min) for t in [0, 1], without overflowing the span
 */
function offsetInRange(t: number, range: Range): number {
  const span = range.max - range.min;
  if (Number.isFinite(span)) {
    return range.min + t * span;
  }
  return 2 * (range.min / 2 + t * (range.max / 2 - range.min / 2));
}

/**
 * Position of x within the range as a fraction of the span
 */
function fractionOf(x: number, range: Range): number {
  const span = range.max - range.min;
  if (Number.isFinite(span)) {
    return (x - range.min) / span;
  }
  return (x / 2 - range.min / 2) / (range.max / 2 - range.min / 2);
}

/**
 * Width is (max - min) / k; 0 for a degenerate range or a span that
 * underflows, Infinity only when one bin is wider than the largest double.
 *
 * @throws InvalidBinCountError for k < 1 or non-integer k
 */
export function createBinSpec(range: Range, k: number): BinSpec {
  validateBinCount(k);
  if (isDegenerate(range)) {
    return { count: k, width: 0 };
  }
  const span = range.max - range.min;
  const width = Number.isFinite(span)
    ? span / k
    : ((range.max / 2 - range.min / 2) / k) * 2;
  return { count: k, width };
}

/**
 * Lower edge of bin i. Each edge is derived from min directly rather than by
 * repeated addition so they do not drift.
 */
export function lowerEdge(i: number, range: Range, spec: BinSpec): number {
  if (i === 0 || isDegenerate(range)) return range.min;
  return offsetInRange(i / spec.count, range);
}

/**
 * Bin index for x: floor(k * (x - min) / (max - min)), clamped to [0, k - 1].
 *
 * Rounding can land one bin off an edge computed by lowerEdge() (e.g. 0.47
 * with 100 bins over [0, 1]), so the index is nudged until it agrees with the
 * edges. Values at max always end up in the last bin.
 */
export function binIndex(x: number, range: Range, spec: BinSpec): number {
  const last = spec.count - 1;
  if (isDegenerate(range)) return 0;

  let index = Math.floor(fractionOf(x, range) * spec.count);
  if (!Number.isFinite(index)) index = 0;
  if (index > last) index = last;
  if (index < 0) index = 0;

  while (index < last && x >= lowerEdge(index + 1, range, spec)) index++;
  while (index > 0 && x < lowerEdge(index, range, spec)) index--;

  return index;
}

/**
 * Count samples into k ascending bins.
 *
 * Every sample is counted in exactly one bin; counts sum to samples.length.
 * With a degenerate range (min == max) all samples go to bin 0 and every
 * bin's bounds collapse to min.
 */
export function binSamples(samples: readonly number[], range: Range, k: number): readonly Bin[] {
  const spec = createBinSpec(range, k);
  const counts = new Array<number>(spec.count).fill(0);

  for (const x of samples) {
    counts[binIndex(x, range, spec)]++;
  }

  const last = spec.count - 1;
  return counts.map((count, index) => ({
    index,
    lower: lowerEdge(index, range, spec),
    upper: index === last ? range.max : lowerEdge(index + 1, range, spec),
    count,
    closed: index === last,
  }));
}
