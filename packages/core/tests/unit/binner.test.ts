/**
 * Unit tests for the Binner
 */

import { describe, it, expect } from 'vitest';
import {
  binIndex,
  binSamples,
  createBinSpec,
  lowerEdge,
  rangeOf,
} from '../../src/binning/binner.js';
import { InvalidBinCountError } from '../../src/errors.js';

describe('rangeOf', () => {
  it('finds min and max', () => {
    expect(rangeOf([3, -1, 2])).toEqual({ min: -1, max: 3 });
  });
});

describe('createBinSpec', () => {
  it('divides the range evenly', () => {
    expect(createBinSpec({ min: 0, max: 10 }, 4)).toEqual({ count: 4, width: 2.5 });
  });

  it('reports zero width for a degenerate range', () => {
    expect(createBinSpec({ min: 5, max: 5 }, 3)).toEqual({ count: 3, width: 0 });
  });

  it('rejects k < 1', () => {
    expect(() => createBinSpec({ min: 0, max: 1 }, 0)).toThrow(InvalidBinCountError);
  });

  it('keeps the width finite when the span overflows', () => {
    expect(createBinSpec({ min: -1e308, max: 1e308 }, 4)).toEqual({ count: 4, width: 5e307 });
  });
});

describe('binSamples', () => {
  it('puts one of 1..5 in each of five bins', () => {
    const samples = [1, 2, 3, 4, 5];
    const bins = binSamples(samples, rangeOf(samples), 5);

    expect(bins.map((bin) => bin.count)).toEqual([1, 1, 1, 1, 1]);

    const expectedLowers = [1, 1.8, 2.6, 3.4, 4.2];
    const expectedUppers = [1.8, 2.6, 3.4, 4.2, 5];
    bins.forEach((bin, i) => {
      expect(bin.index).toBe(i);
      expect(bin.lower).toBeCloseTo(expectedLowers[i], 12);
      expect(bin.upper).toBeCloseTo(expectedUppers[i], 12);
    });

    expect(bins.map((bin) => bin.closed)).toEqual([false, false, false, false, true]);
    expect(bins[4].upper).toBe(5);
  });

  it('puts every sample of a degenerate range in the first bin', () => {
    const bins = binSamples([5, 5, 5], { min: 5, max: 5 }, 3);

    expect(bins.map((bin) => bin.count)).toEqual([3, 0, 0]);
    for (const bin of bins) {
      expect(bin.lower).toBe(5);
      expect(bin.upper).toBe(5);
    }
  });

  it('counts the maximum in the last bin', () => {
    const samples = [0, 0.3];
    const bins = binSamples(samples, rangeOf(samples), 3);
    expect(bins.map((bin) => bin.count)).toEqual([1, 0, 1]);
  });

  it('handles negative values', () => {
    const samples = [-10, -5, 0, 5, 10];
    const bins = binSamples(samples, rangeOf(samples), 4);

    expect(bins.map((bin) => bin.count)).toEqual([1, 1, 1, 2]);
    expect(bins.map((bin) => bin.lower)).toEqual([-10, -5, 0, 5]);
  });

  it('is independent of sample order', () => {
    const samples = [0.47, 0.1, 0.99, 0, 1, 0.5, 0.46];
    const range = rangeOf(samples);
    expect(binSamples([...samples].reverse(), range, 100)).toEqual(binSamples(samples, range, 100));
  });

  it('counts every sample when max - min overflows', () => {
    const samples = [-1e308, 0, 1e308];
    const bins = binSamples(samples, rangeOf(samples), 4);

    expect(bins.map((bin) => bin.count)).toEqual([1, 0, 1, 1]);
    expect(bins.slice(0, 3).map((bin) => bin.lower)).toEqual([-1e308, -5e307, 0]);
    expect(bins[3].lower / 5e307).toBeCloseTo(1, 12);
    expect(bins[3].upper).toBe(1e308);
  });

  it('treats a subnormal span as a real range', () => {
    const samples = [0, 5e-324];
    const bins = binSamples(samples, rangeOf(samples), 4);

    expect(bins.reduce((sum, bin) => sum + bin.count, 0)).toBe(2);
    expect(bins[3].count).toBe(1);
    expect(bins[3].upper).toBe(5e-324);
  });

  it('rejects k < 1', () => {
    expect(() => binSamples([1, 2], { min: 1, max: 2 }, 0)).toThrow(InvalidBinCountError);
  });
});

describe('binIndex', () => {
  it('agrees with the computed lower edges', () => {
    const range = { min: 0, max: 1 };
    const spec = createBinSpec(range, 100);
    const index = binIndex(0.47, range, spec);

    expect(lowerEdge(index, range, spec)).toBeLessThanOrEqual(0.47);
    expect(lowerEdge(index + 1, range, spec)).toBeGreaterThan(0.47);
  });

  it('returns 0 for a zero-width BinSpec', () => {
    expect(binIndex(5, { min: 5, max: 5 }, { count: 4, width: 0 })).toBe(0);
  });

  it('places the maximum of an overflowing range in the last bin', () => {
    const range = { min: -1e308, max: 1e308 };
    expect(binIndex(1e308, range, createBinSpec(range, 4))).toBe(3);
  });

  it('clamps values at the maximum into the last bin', () => {
    const range = { min: 1, max: 5 };
    expect(binIndex(5, range, createBinSpec(range, 5))).toBe(4);
  });
});
