import { EmptyInputError } from '../errors.js';
import type { Quartiles } from '../types.js';

/**
 * Quartiles by lower nearest rank.
 *
 * With q = floor(n / 4), returns sorted[q], sorted[2q], sorted[3q]. For small
 * sets (n < 4) every quartile collapses to the minimum.
 */
export function quartiles(samples: readonly number[]): Quartiles {
  if (samples.length === 0) {
    throw new EmptyInputError();
  }

  const sorted = [...samples].sort((a, b) => a - b);
  const q = Math.floor(sorted.length * 0.25);

  return {
    p25: sorted[q],
    p50: sorted[q * 2],
    p75: sorted[q * 3],
  };
}
