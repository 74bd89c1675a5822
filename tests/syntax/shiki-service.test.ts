/**
 * Shiki service tests. These run the real highlighter in process.
 */

import { describe, it, expect } from 'vitest';
import {
  highlightCode,
  listStyles,
  isBundledTheme,
  normalizeCode,
} from '../../src/syntax/shiki-service.js';
import { RenderError } from '../../src/errors/index.js';

const HEX = /^#[0-9a-fA-F]{3,8}$/;

describe('normalizeCode', () => {
  it('drops leading blank lines and trailing whitespace', () => {
    expect(normalizeCode('\n\n  x = 1\ny = 2\n\n  ')).toBe('  x = 1\ny = 2');
  });

  it('keeps tabs and normalizes line endings', () => {
    expect(normalizeCode('a\r\n\tb\rc')).toBe('a\n\tb\nc');
    expect(normalizeCode('\tif x:\n\t\treturn')).toBe('\tif x:\n\t\treturn');
  });
});

describe('listStyles', () => {
  it('lists bundled themes in order', () => {
    const styles = listStyles();
    expect(styles).toContain('monokai');
    expect(styles).toContain('github-dark');
    expect([...styles].sort()).toEqual(styles);
  });

  it('recognizes bundled theme names', () => {
    expect(isBundledTheme('monokai')).toBe(true);
    expect(isBundledTheme('no-such-theme')).toBe(false);
  });
});

describe('highlightCode', () => {
  it('returns one token line per source line', async () => {
    const result = await highlightCode('def f():\n    return 1\n', { language: 'python', style: 'monokai' });

    expect(result.lines).toHaveLength(2);
    expect(result.lines.map((line) => line.map((t) => t.content).join(''))).toEqual([
      'def f():',
      '    return 1',
    ]);
    expect(result.background).toMatch(HEX);
    expect(result.foreground).toMatch(HEX);
    expect(result.lineHighlight).toMatch(HEX);
  });

  it('colors keywords differently from plain text', async () => {
    const result = await highlightCode('def f():\n    pass', { language: 'python', style: 'monokai' });
    const keyword = result.lines[0].find((t) => t.content.trim() === 'def');
    expect(keyword?.color).toMatch(HEX);
    expect(keyword?.color?.toLowerCase()).not.toBe(result.foreground.toLowerCase());
  });

  it('handles plain text without loading a grammar', async () => {
    const result = await highlightCode('hello <world>', { language: 'text', style: 'github-dark' });
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0].map((t) => t.content).join('')).toBe('hello <world>');
  });

  it('rejects an unknown style', async () => {
    await expect(highlightCode('x', { language: 'text', style: 'no-such-theme' })).rejects.toThrow(
      "Unknown style 'no-such-theme' (see --list-styles)"
    );
    await expect(highlightCode('x', { language: 'text', style: 'no-such-theme' })).rejects.toBeInstanceOf(
      RenderError
    );
  });

  it('rejects a grammar id that is not bundled', async () => {
    await expect(highlightCode('x', { language: 'no-such-lang', style: 'monokai' })).rejects.toThrow(
      "Unknown language 'no-such-lang'"
    );
  });
});
