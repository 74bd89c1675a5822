/**
 * Syntax Highlighting Module
 *
 * Shiki does the tokenizing, highlight.js guesses languages; the formatters
 * here turn the colored tokens into line-numbered SVG or HTML.
 */

export {
  highlightCode,
  listStyles,
  isBundledTheme,
  isBundledLanguage,
  normalizeCode,
  type HighlightedCode,
  type HighlightOptions,
  type StyledToken,
} from './shiki-service.js';
export {
  resolveLanguage,
  detectLanguage,
  findLanguage,
  listLanguages,
  PLAIN_TEXT,
  type ResolvedLanguage,
} from './languages.js';
export { renderSvg, computeSvgLayout, type SvgFormatOptions, type SvgLayout } from './svg-formatter.js';
export { renderHtml, type HtmlFormatOptions } from './html-formatter.js';
export { escapeMarkup } from './escape.js';
