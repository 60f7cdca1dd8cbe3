/**
 * Bin Count Selection
 *
 * An explicit count always wins. Otherwise a rule of thumb picks one from the
 * sample count, capped by the caller's row budget.
 */

import { InvalidBinCountError } from '../errors.js';
import type { BinStrategy } from '../schemas.js';
import type { BinCountOptions } from '../types.js';

/**
 * @throws InvalidBinCountError unless k is a positive integer
 */
export function validateBinCount(k: number): number {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidBinCountError(k);
  }
  return k;
}

/**
 * Rule-of-thumb bin count for n samples (always >= 1)
 *
 * - sturges: ceil(log2 n) + 1
 * - sqrt:    ceil(sqrt n)
 * - rice:    ceil(2 * cbrt n)
 */
export function autoBinCount(n: number, strategy: BinStrategy = 'sturges'): number {
  if (n <= 1) return 1;

  switch (strategy) {
    case 'sturges':
      return Math.ceil(Math.log2(n)) + 1;
    case 'sqrt':
      return Math.max(1, Math.ceil(Math.sqrt(n)));
    case 'rice':
      return Math.max(1, Math.ceil(2 * Math.cbrt(n)));
  }
}

export function resolveBinCount(options: BinCountOptions, sampleCount: number): number {
  if (options.binCount !== undefined) {
    return validateBinCount(options.binCount);
  }

  const auto = autoBinCount(sampleCount, options.strategy);
  if (options.maxBins === undefined) {
    return auto;
  }
  return Math.min(auto, validateBinCount(options.maxBins));
}
