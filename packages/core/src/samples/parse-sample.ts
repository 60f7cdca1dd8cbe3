/**
 * Sample Parsing
 *
 * Turns one input line into a LineResult. Failures are values, not
 * exceptions; only the collector decides whether a failure is fatal.
 */

/** Plain decimal notation: sign, digits, optional fraction, optional exponent */
const DECIMAL_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/** First number embedded anywhere in a line (used with `extract`) */
const EMBEDDED_NUMBER_PATTERN = /[-+]?[0-9]*\.?[0-9]+(?:[eE][-+]?[0-9]+)?/;

export type LineResult =
  | { readonly kind: 'sample'; readonly value: number }
  | { readonly kind: 'blank' }
  | { readonly kind: 'invalid'; readonly reason: string };

export interface ParseLineOptions {
  /** Pull the first number out of the line instead of requiring the whole line */
  extract?: boolean;
}

function toSample(token: string): LineResult {
  const value = Number(token);
  if (!Number.isFinite(value)) {
    return { kind: 'invalid', reason: `value out of range: '${token}'` };
  }
  return { kind: 'sample', value };
}

/**
 * Parse a single line into a sample
 */
export function parseSampleLine(line: string, options: ParseLineOptions = {}): LineResult {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return { kind: 'blank' };
  }

  if (options.extract) {
    const match = EMBEDDED_NUMBER_PATTERN.exec(trimmed);
    if (!match) {
      return { kind: 'invalid', reason: `no number found in '${trimmed}'` };
    }
    return toSample(match[0]);
  }

  if (!DECIMAL_PATTERN.test(trimmed)) {
    return { kind: 'invalid', reason: `not a number: '${trimmed}'` };
  }
  return toSample(trimmed);
}
