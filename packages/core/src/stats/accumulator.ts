/**
 * StatisticsAccumulator
 *
 * Single-pass running aggregates: count, Σx, Σx², min, max.
 *
 * Variance uses the two-moment formula Σx²/n − mean². It loses precision to
 * catastrophic cancellation when |mean| is large relative to the spread
 * (e.g. 1e9 + small noise); results are clamped at zero so sqrt never sees a
 * tiny negative. Adequate for display, not for scientific work.
 *
 * Σx² overflows once |x| exceeds about 1.3e154 (and Σx near the largest
 * double), so the same sums are also kept over x * 2^-540 and used whenever
 * the plain ones are no longer finite.
 */

import { EmptyInputError } from '../errors.js';
import type { SummaryStats } from '../types.js';

const DOWNSCALE = 2 ** -540;
const UPSCALE = 2 ** 540;

export class StatisticsAccumulator {
  private n = 0;
  private sum = 0;
  private sumOfSquares = 0;
  private scaledSum = 0;
  private scaledSumOfSquares = 0;
  private min = Number.POSITIVE_INFINITY;
  private max = Number.NEGATIVE_INFINITY;

  /**
   * Add one finite sample
   */
  observe(sample: number): void {
    this.n++;
    this.sum += sample;
    this.sumOfSquares += sample * sample;
    const scaled = sample * DOWNSCALE;
    this.scaledSum += scaled;
    this.scaledSumOfSquares += scaled * scaled;
    if (sample < this.min) this.min = sample;
    if (sample > this.max) this.max = sample;
  }

  observeAll(samples: Iterable<number>): this {
    for (const sample of samples) {
      this.observe(sample);
    }
    return this;
  }

  get count(): number {
    return this.n;
  }

  /**
   * Snapshot of the aggregates.
   *
   * @throws EmptyInputError when nothing was observed
   */
  finalize(): SummaryStats {
    if (this.n === 0) {
      throw new EmptyInputError();
    }

    const n = this.n;
    const scaledMean = this.scaledSum / n;
    const mean = Number.isFinite(this.sum) ? this.sum / n : scaledMean * UPSCALE;

    let stddev: number;
    if (Number.isFinite(this.sumOfSquares)) {
      stddev = Math.sqrt(Math.max(0, this.sumOfSquares / n - mean * mean));
    } else {
      const scaledVariance = this.scaledSumOfSquares / n - scaledMean * scaledMean;
      stddev = Math.sqrt(Math.max(0, scaledVariance)) * UPSCALE;
    }

    return {
      count: this.n,
      sum: this.sum,
      min: this.min,
      max: this.max,
      mean,
      stddev,
    };
  }
}

/**
 * Convenience wrapper over StatisticsAccumulator for an in-memory sample set
 */
export function summarize(samples: Iterable<number>): SummaryStats {
  return new StatisticsAccumulator().observeAll(samples).finalize();
}
