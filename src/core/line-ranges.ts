/**
 * Line Range Parsing
 *
 * Turns a spec such as "8-10 15 20-22" into the sorted line numbers
 * [8, 9, 10, 15, 20, 21, 22]. Tokens are whitespace separated; each is a
 * line number or an inclusive `start-end` range.
 */

import {
  InvalidLineNumberError,
  InvalidRangeError,
  InvalidRangeFormatError,
} from '../errors/index.js';

const INTEGER = /^\d+$/;

/**
 * Parse a positive base-10 integer. Throws with the reason on failure.
 */
function parsePositiveInt(text: string): number {
  if (!INTEGER.test(text)) {
    throw new Error(`invalid literal for integer: '${text}'`);
  }
  const value = Number.parseInt(text, 10);
  if (!Number.isSafeInteger(value)) {
    throw new Error(`line number too large: '${text}'`);
  }
  if (value < 1) {
    throw new Error(`line numbers start at 1, got ${value}`);
  }
  return value;
}

/**
 * Parse a line spec into ascending, de-duplicated, 1-based line numbers.
 * Empty or missing input means no lines.
 *
 * @throws InvalidRangeFormatError - a range bound is not a positive integer
 * @throws InvalidRangeError - a range has start > end
 * @throws InvalidLineNumberError - a single token is not a positive integer
 */
export function parseLineSpec(spec?: string | null): number[] {
  if (!spec || spec.trim().length === 0) {
    return [];
  }

  const lines = new Set<number>();

  for (const token of spec.trim().split(/\s+/)) {
    const hyphen = token.indexOf('-');

    if (hyphen === -1) {
      try {
        lines.add(parsePositiveInt(token));
      } catch {
        throw new InvalidLineNumberError(token);
      }
      continue;
    }

    let start: number;
    let end: number;
    try {
      start = parsePositiveInt(token.slice(0, hyphen).trim());
      end = parsePositiveInt(token.slice(hyphen + 1).trim());
    } catch (err) {
      throw new InvalidRangeFormatError(token, err instanceof Error ? err : new Error(String(err)));
    }

    if (start > end) {
      throw new InvalidRangeError(token, start, end);
    }

    for (let line = start; line <= end; line++) {
      lines.add(line);
    }
  }

  return [...lines].sort((a, b) => a - b);
}

/**
 * Compact sorted line numbers back into a spec: [1, 2, 3, 5] -> "1-3 5".
 */
export function formatLineSet(lines: readonly number[]): string {
  const parts: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const start = lines[i];
    let end = start;
    while (i + 1 < lines.length && lines[i + 1] === end + 1) {
      end = lines[++i];
    }
    parts.push(start === end ? `${start}` : `${start}-${end}`);
    i++;
  }

  return parts.join(' ');
}
