/**
 * Shiki Highlighting Service
 *
 * Wraps Shiki's tokenizer: loads one theme and one grammar per call and
 * returns colored tokens grouped by line, plus the theme colors the
 * formatters need.
 */

import {
  bundledLanguages,
  bundledThemes,
  createHighlighter,
  type BundledLanguage,
  type BundledTheme,
  type ThemedToken,
} from 'shiki';
import { RenderError } from '../errors/index.js';
import { DEFAULT_HIGHLIGHT_COLOR } from '../core/markup.js';
import { PLAIN_TEXT } from './languages.js';

// Bit flags of Shiki's FontStyle
const ITALIC = 1;
const BOLD = 2;
const UNDERLINE = 4;

export interface StyledToken {
  content: string;
  color?: string;
  italic: boolean;
  bold: boolean;
  underline: boolean;
}

export interface HighlightedCode {
  /** One entry per source line */
  lines: StyledToken[][];
  foreground: string;
  background: string;
  lineNumberColor: string;
  /** Theme's current-line tint, used for highlighted HTML lines */
  lineHighlight: string;
}

export interface HighlightOptions {
  /** Grammar id as returned by resolveLanguage() */
  language: string;
  /** Theme name */
  style: string;
}

export function isBundledTheme(name: string): name is BundledTheme {
  return Object.prototype.hasOwnProperty.call(bundledThemes, name);
}

export function isBundledLanguage(name: string): name is BundledLanguage {
  return Object.prototype.hasOwnProperty.call(bundledLanguages, name);
}

/**
 * All bundled theme names, sorted.
 */
export function listStyles(): string[] {
  return Object.keys(bundledThemes).sort();
}

/**
 * Normalize code before tokenizing: drop leading blank lines and trailing
 * whitespace, unify line endings. Tabs are kept as written.
 */
export function normalizeCode(code: string): string {
  return code
    .replace(/^(?:[ \t]*\r?\n)+/, '')
    .replace(/\s+$/, '')
    .replace(/\r\n?/g, '\n');
}

function toStyledToken(token: ThemedToken): StyledToken {
  const fontStyle = token.fontStyle ?? 0;
  return {
    content: token.content,
    ...(token.color ? { color: token.color } : {}),
    italic: (fontStyle & ITALIC) !== 0,
    bold: (fontStyle & BOLD) !== 0,
    underline: (fontStyle & UNDERLINE) !== 0,
  };
}

/**
 * Tokenize `code` with the given grammar and theme.
 *
 * @throws RenderError - unknown theme or a grammar that fails to load
 */
export async function highlightCode(code: string, options: HighlightOptions): Promise<HighlightedCode> {
  const { language, style } = options;

  if (!isBundledTheme(style)) {
    throw new RenderError(`Unknown style '${style}' (see --list-styles)`, 'highlight', { style });
  }

  let lang: BundledLanguage | typeof PLAIN_TEXT = PLAIN_TEXT;
  if (language !== PLAIN_TEXT) {
    if (!isBundledLanguage(language)) {
      throw new RenderError(`Unknown language '${language}'`, 'highlight', { language });
    }
    lang = language;
  }

  const highlighter = await createHighlighter({
    themes: [style],
    langs: lang === PLAIN_TEXT ? [] : [lang],
  }).catch((err: unknown) => {
    throw RenderError.fromError(err, 'highlight', { language, style });
  });

  try {
    const result = highlighter.codeToTokens(normalizeCode(code), { lang, theme: style });
    const theme = highlighter.getTheme(style);
    const colors = theme.colors ?? {};
    const foreground = result.fg ?? theme.fg;
    const background = result.bg ?? theme.bg;

    return {
      lines: result.tokens.map((line) => line.map(toStyledToken)),
      foreground,
      background,
      lineNumberColor: colors['editorLineNumber.foreground'] ?? foreground,
      lineHighlight: colors['editor.lineHighlightBackground'] ?? DEFAULT_HIGHLIGHT_COLOR,
    };
  } catch (err) {
    throw RenderError.fromError(err, 'highlight', { language, style });
  } finally {
    highlighter.dispose();
  }
}
