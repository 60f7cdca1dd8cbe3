/**
 * Sample Collection
 *
 * Folds per-line results into the sample set plus a skipped-line tally.
 */

import { ParseError } from '../errors.js';
import {
  MAX_RECORDED_INVALID,
  ReadOptionsSchema,
  type ReadOptions,
} from '../schemas.js';
import type { InvalidLine } from '../types.js';
import { parseSampleLine } from './parse-sample.js';

export interface CollectedSamples {
  readonly samples: readonly number[];
  /** Malformed lines skipped (blank lines are not counted) */
  readonly skipped: number;
  /** The first few malformed lines, for diagnostics */
  readonly invalid: readonly InvalidLine[];
  /** Lines consumed, including blank and malformed ones */
  readonly linesRead: number;
}

/**
 * Parse every line into samples.
 *
 * Non-strict: malformed lines are skipped and tallied.
 * Strict: the first malformed line throws ParseError.
 */
export function collectSamples(lines: Iterable<string>, options: ReadOptions = {}): CollectedSamples {
  const { strict, extract, maxLines } = ReadOptionsSchema.parse(options);

  const samples: number[] = [];
  const invalid: InvalidLine[] = [];
  let skipped = 0;
  let linesRead = 0;

  for (const line of lines) {
    if (linesRead >= maxLines) break;
    linesRead++;

    const result = parseSampleLine(line, { extract });
    switch (result.kind) {
      case 'sample':
        samples.push(result.value);
        break;
      case 'blank':
        break;
      case 'invalid':
        if (strict) {
          throw new ParseError(linesRead, line, result.reason);
        }
        skipped++;
        if (invalid.length < MAX_RECORDED_INVALID) {
          invalid.push({ lineNumber: linesRead, line, reason: result.reason });
        }
        break;
    }
  }

  return { samples, skipped, invalid, linesRead };
}

/**
 * True when more than half of the non-blank lines are not numbers.
 * Used by `auto` mode to fall back to a categorical chart.
 */
export function isMostlyNonNumeric(lines: readonly string[], options: { extract?: boolean } = {}): boolean {
  let nonBlank = 0;
  let failures = 0;
  for (const line of lines) {
    const result = parseSampleLine(line, options);
    if (result.kind === 'blank') continue;
    nonBlank++;
    if (result.kind === 'invalid') failures++;
  }
  return failures > nonBlank / 2;
}
