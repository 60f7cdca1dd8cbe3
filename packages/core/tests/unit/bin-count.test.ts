/**
 * Unit tests for bin count selection
 */

import { describe, it, expect } from 'vitest';
import { autoBinCount, resolveBinCount, validateBinCount } from '../../src/binning/bin-count.js';
import { InvalidBinCountError } from '../../src/errors.js';

describe('validateBinCount', () => {
  it('returns positive integers unchanged', () => {
    expect(validateBinCount(1)).toBe(1);
    expect(validateBinCount(30)).toBe(30);
  });

  it.each([0, -1, 2.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects %d', (k) => {
    expect(() => validateBinCount(k)).toThrow(InvalidBinCountError);
  });

  it('names the offending value', () => {
    expect(() => validateBinCount(0)).toThrow('Bin count must be a positive integer (got 0)');
  });
});

describe('autoBinCount', () => {
  it('uses one bin for zero or one sample', () => {
    expect(autoBinCount(0)).toBe(1);
    expect(autoBinCount(1)).toBe(1);
  });

  it('defaults to Sturges', () => {
    expect(autoBinCount(5)).toBe(4);
    expect(autoBinCount(8)).toBe(4);
    expect(autoBinCount(1000)).toBe(11);
  });

  it('supports the square-root rule', () => {
    expect(autoBinCount(100, 'sqrt')).toBe(10);
    expect(autoBinCount(101, 'sqrt')).toBe(11);
  });

  it('supports the Rice rule', () => {
    expect(autoBinCount(10, 'rice')).toBe(5);
  });
});

describe('resolveBinCount', () => {
  it('prefers an explicit bin count', () => {
    expect(resolveBinCount({ binCount: 7, maxBins: 3 }, 1000)).toBe(7);
  });

  it('validates an explicit bin count', () => {
    expect(() => resolveBinCount({ binCount: 0 }, 10)).toThrow(InvalidBinCountError);
  });

  it('caps the automatic count by maxBins', () => {
    expect(resolveBinCount({}, 1000)).toBe(11);
    expect(resolveBinCount({ maxBins: 5 }, 1000)).toBe(5);
    expect(resolveBinCount({ strategy: 'sqrt', maxBins: 50 }, 100)).toBe(10);
  });

  it('rejects a non-positive maxBins', () => {
    expect(() => resolveBinCount({ maxBins: 0 }, 100)).toThrow(InvalidBinCountError);
  });
});
