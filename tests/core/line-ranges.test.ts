/**
 * Line spec parsing tests.
 */

import { describe, it, expect } from 'vitest';
import { parseLineSpec, formatLineSet } from '../../src/core/line-ranges.js';
import {
  InvalidLineNumberError,
  InvalidRangeError,
  InvalidRangeFormatError,
  LineSpecError,
} from '../../src/errors/index.js';

describe('parseLineSpec', () => {
  it('returns no lines for empty or missing input', () => {
    expect(parseLineSpec('')).toEqual([]);
    expect(parseLineSpec('   ')).toEqual([]);
    expect(parseLineSpec(undefined)).toEqual([]);
    expect(parseLineSpec(null)).toEqual([]);
  });

  it('parses single line numbers', () => {
    expect(parseLineSpec('8 9 10')).toEqual([8, 9, 10]);
  });

  it('expands inclusive ranges', () => {
    expect(parseLineSpec('8-10 15')).toEqual([8, 9, 10, 15]);
    expect(parseLineSpec('1-3 5 7-9')).toEqual([1, 2, 3, 5, 7, 8, 9]);
  });

  it('accepts a single-line range', () => {
    expect(parseLineSpec('4-4')).toEqual([4]);
  });

  it('sorts and removes duplicates', () => {
    expect(parseLineSpec('5 5 3-4')).toEqual([3, 4, 5]);
    expect(parseLineSpec('3-5')).toEqual([3, 4, 5]);
    expect(parseLineSpec('20 2-4 3')).toEqual([2, 3, 4, 20]);
  });

  it('tolerates irregular whitespace between tokens', () => {
    expect(parseLineSpec('  1\t3\n 5 ')).toEqual([1, 3, 5]);
  });

  it('does not check lines against any document length', () => {
    expect(parseLineSpec('9999')).toEqual([9999]);
  });

  it('is deterministic', () => {
    expect(parseLineSpec('2-3 1')).toEqual(parseLineSpec('2-3 1'));
  });

  it('rejects a range whose start is greater than its end', () => {
    expect(() => parseLineSpec('10-8')).toThrow(InvalidRangeError);
    expect(() => parseLineSpec('1 10-8')).toThrow(
      expect.objectContaining({
        token: '10-8',
        start: 10,
        end: 8,
        message: "Invalid range '10-8': start (10) is greater than end (8)",
      }),
    );
  });

  it('rejects a non-numeric line number', () => {
    expect(() => parseLineSpec('abc')).toThrow(InvalidLineNumberError);
    expect(() => parseLineSpec('3a')).toThrow("Invalid line number: '3a'");
  });

  it('rejects line zero', () => {
    expect(() => parseLineSpec('0')).toThrow(InvalidLineNumberError);
    expect(() => parseLineSpec('0-3')).toThrow(InvalidRangeFormatError);
  });

  it('rejects non-integer range bounds with the parse failure', () => {
    expect(() => parseLineSpec('1-x')).toThrow(
      "Invalid range format '1-x': invalid literal for integer: 'x'"
    );
    expect(() => parseLineSpec('-5')).toThrow(InvalidRangeFormatError);
    expect(() => parseLineSpec('3-')).toThrow(InvalidRangeFormatError);
    expect(() => parseLineSpec('1.5-2')).toThrow(InvalidRangeFormatError);
  });

  it('splits a range on the first hyphen only', () => {
    expect(() => parseLineSpec('1-2-3')).toThrow(
      "Invalid range format '1-2-3': invalid literal for integer: '2-3'"
    );
  });

  it('reports every failure as a LineSpecError carrying the token', () => {
    for (const spec of ['abc', '10-8', '1-x']) {
      expect(() => parseLineSpec(spec)).toThrow(LineSpecError);
      expect(() => parseLineSpec(spec)).toThrow(expect.objectContaining({ token: spec }));
    }
  });

  it('rejects a line number beyond the safe integer range', () => {
    expect(() => parseLineSpec('9007199254740993')).toThrow(InvalidLineNumberError);
    expect(() => parseLineSpec('9007199254740993')).toThrow("Invalid line number: '9007199254740993'");
    expect(parseLineSpec('9007199254740991')).toEqual([9007199254740991]);
  });

  it('rejects a range bound beyond the safe integer range without expanding it', () => {
    const token = '100000000000000000000-100000000000000000000';
    expect(() => parseLineSpec(token)).toThrow(InvalidRangeFormatError);
    expect(() => parseLineSpec(token)).toThrow(
      `Invalid range format '${token}': line number too large: '100000000000000000000'`,
    );
    expect(() => parseLineSpec('1-9007199254740992')).toThrow(InvalidRangeFormatError);
  });
});

describe('formatLineSet', () => {
  it('compacts consecutive runs', () => {
    expect(formatLineSet([1, 2, 3, 5, 7, 8, 9])).toBe('1-3 5 7-9');
  });

  it('handles empty and single inputs', () => {
    expect(formatLineSet([])).toBe('');
    expect(formatLineSet([4])).toBe('4');
  });

  it('round-trips through parseLineSpec', () => {
    expect(parseLineSpec(formatLineSet([2, 3, 4, 10]))).toEqual([2, 3, 4, 10]);
  });
});
