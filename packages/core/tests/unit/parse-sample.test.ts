/**
 * Unit tests for line parsing
 */

import { describe, it, expect } from 'vitest';
import { parseSampleLine } from '../../src/samples/parse-sample.js';

describe('parseSampleLine', () => {
  it.each([
    ['42', 42],
    ['  -3.5  ', -3.5],
    ['+7', 7],
    ['1e3', 1000],
    ['2.5E-1', 0.25],
    ['.5', 0.5],
    ['5.', 5],
  ])('parses %j as %d', (line, expected) => {
    expect(parseSampleLine(line)).toEqual({ kind: 'sample', value: expected });
  });

  it('treats empty and whitespace-only lines as blank', () => {
    expect(parseSampleLine('')).toEqual({ kind: 'blank' });
    expect(parseSampleLine(' \t ')).toEqual({ kind: 'blank' });
  });

  it('rejects text with a reason', () => {
    expect(parseSampleLine('abc')).toEqual({ kind: 'invalid', reason: "not a number: 'abc'" });
  });

  it.each(['NaN', 'Infinity', '-Infinity', '0x10', '1,000', '1 2', '12ms'])(
    'rejects %j',
    (line) => {
      expect(parseSampleLine(line).kind).toBe('invalid');
    }
  );

  it('rejects values that overflow to infinity', () => {
    expect(parseSampleLine('1e400')).toEqual({
      kind: 'invalid',
      reason: "value out of range: '1e400'",
    });
  });

  describe('extract mode', () => {
    it('uses the first number embedded in the line', () => {
      expect(parseSampleLine('latency=12.5ms', { extract: true })).toEqual({
        kind: 'sample',
        value: 12.5,
      });
      expect(parseSampleLine('delta -3 units', { extract: true })).toEqual({
        kind: 'sample',
        value: -3,
      });
    });

    it('reports lines without any number', () => {
      expect(parseSampleLine('none', { extract: true })).toEqual({
        kind: 'invalid',
        reason: "no number found in 'none'",
      });
    });

    it('still rejects overflowing numbers', () => {
      expect(parseSampleLine('size 1e999 bytes', { extract: true }).kind).toBe('invalid');
    });
  });
});
