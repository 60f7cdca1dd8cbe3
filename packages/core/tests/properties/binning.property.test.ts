/**
 * Property tests for binning
 *
 * Checks the binning invariants over generated sample sets rather than
 * hand-picked cases.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { binIndex, binSamples, createBinSpec, rangeOf } from '../../src/binning/binner.js';

/** Every finite double, including subnormals and values near ±1.8e308 */
const anyFinite = fc.double({ noNaN: true, noDefaultInfinity: true });
const moderate = fc.double({ min: -1e6, max: 1e6, noNaN: true, noDefaultInfinity: true });

const finiteSamples = fc.array(fc.oneof(moderate, anyFinite), { minLength: 1, maxLength: 200 });
const extremeSamples = fc.array(anyFinite, { minLength: 1, maxLength: 50 });
const integerSamples = fc.array(fc.integer({ min: -1_000_000, max: 1_000_000 }), {
  minLength: 1,
  maxLength: 200,
});
const binCounts = fc.integer({ min: 1, max: 50 });

describe('binSamples properties', () => {
  it('counts every sample exactly once', () => {
    fc.assert(
      fc.property(finiteSamples, binCounts, (samples, k) => {
        const bins = binSamples(samples, rangeOf(samples), k);
        expect(bins).toHaveLength(k);
        expect(bins.reduce((sum, bin) => sum + bin.count, 0)).toBe(samples.length);
      })
    );
  });

  it('produces contiguous bins spanning [min, max]', () => {
    fc.assert(
      fc.property(finiteSamples, binCounts, (samples, k) => {
        const range = rangeOf(samples);
        const bins = binSamples(samples, range, k);

        expect(bins[0].lower).toBe(range.min);
        expect(bins[k - 1].upper).toBe(range.max);
        expect(bins[k - 1].closed).toBe(true);
        for (let i = 0; i + 1 < k; i++) {
          expect(bins[i].upper).toBe(bins[i + 1].lower);
          expect(bins[i].lower).toBeLessThanOrEqual(bins[i + 1].lower);
          expect(bins[i].closed).toBe(false);
        }
      })
    );
  });

  it('orders bin boundaries strictly when the range is wide enough', () => {
    fc.assert(
      fc.property(integerSamples, binCounts, (samples, k) => {
        const range = rangeOf(samples);
        fc.pre(range.max > range.min);
        const bins = binSamples(samples, range, k);
        for (let i = 0; i + 1 < k; i++) {
          expect(bins[i].lower).toBeLessThan(bins[i + 1].lower);
        }
      })
    );
  });

  it('places each sample inside the bounds of its bin', () => {
    fc.assert(
      fc.property(finiteSamples, binCounts, (samples, k) => {
        const range = rangeOf(samples);
        const bins = binSamples(samples, range, k);
        const spec = createBinSpec(range, k);

        for (const x of samples) {
          const bin = bins[binIndex(x, range, spec)];
          if (range.min === range.max) {
            expect(bin.index).toBe(0);
            continue;
          }
          expect(x).toBeGreaterThanOrEqual(bin.lower);
          if (bin.closed) {
            expect(x).toBeLessThanOrEqual(bin.upper);
          } else {
            expect(x).toBeLessThan(bin.upper);
          }
        }
      })
    );
  });

  it('counts the maximum in the last bin', () => {
    fc.assert(
      fc.property(finiteSamples, binCounts, (samples, k) => {
        const range = rangeOf(samples);
        fc.pre(range.max > range.min);
        expect(binIndex(range.max, range, createBinSpec(range, k))).toBe(k - 1);
      })
    );
  });

  it('puts all-equal samples in the first bin', () => {
    fc.assert(
      fc.property(
        anyFinite,
        fc.integer({ min: 1, max: 100 }),
        binCounts,
        (value, n, k) => {
          const samples = Array.from({ length: n }, () => value);
          const counts = binSamples(samples, rangeOf(samples), k).map((bin) => bin.count);
          expect(counts[0]).toBe(n);
          expect(counts.slice(1).every((count) => count === 0)).toBe(true);
        }
      )
    );
  });

  it('keeps every count and finite edges across the whole double range', () => {
    fc.assert(
      fc.property(extremeSamples, binCounts, (samples, k) => {
        const range = rangeOf(samples);
        const bins = binSamples(samples, range, k);

        expect(bins.reduce((sum, bin) => sum + bin.count, 0)).toBe(samples.length);
        for (const bin of bins) {
          expect(Number.isFinite(bin.lower)).toBe(true);
          expect(Number.isFinite(bin.upper)).toBe(true);
        }
        if (range.max > range.min) {
          expect(binIndex(range.max, range, createBinSpec(range, k))).toBe(k - 1);
        }
      })
    );
  });

  it('does not depend on sample order', () => {
    fc.assert(
      fc.property(finiteSamples, binCounts, (samples, k) => {
        const range = rangeOf(samples);
        const reversed = [...samples].reverse();
        expect(binSamples(reversed, range, k)).toEqual(binSamples(samples, range, k));
      })
    );
  });
});
