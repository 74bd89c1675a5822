/**
 * HTML Line Highlighting
 *
 * The formatter has already wrapped highlighted lines in
 * `<span style="background-color: #...">`. This module retints those spans,
 * clears container backgrounds for transparent output without touching the
 * tint, and aligns the line-number gutter with the code column.
 */

import { clearBackgrounds } from './markup.js';

/** Line height shared by the gutter and the code `<pre>`. */
export const LINE_HEIGHT = '125%';

const HIGHLIGHT_SPAN_TAG = /<span\b[^>]*\sstyle="[^"]*background-color\s*:\s*#[0-9a-fA-F]+[^"]*"[^>]*>/g;
const SPAN_BACKGROUND = /(background-color\s*:\s*)#[0-9a-fA-F]+/;
const CONTAINER_TAG = /<(?:div|table|tbody|tr|td|pre|code)\b[^>]*>/g;
const GUTTER_PRE = /(<td class="linenos">(?:(?!<pre\b)[\s\S])*<pre)>/;

/**
 * Retint highlighted spans with `color`. Without requested lines or a
 * custom color the markup is returned unchanged.
 */
export function injectHtml(markup: string, lineNumbers: readonly number[], color?: string): string {
  if (lineNumbers.length === 0 || !color) {
    return markup;
  }

  return markup.replace(HIGHLIGHT_SPAN_TAG, (tag) =>
    tag.replace(SPAN_BACKGROUND, (_m, declaration: string) => `${declaration}${color}`)
  );
}

/**
 * Replace background hex declarations with `transparent`. With highlighted
 * lines only container tags are rewritten, so the span tint stays.
 */
export function makeHtmlTransparent(markup: string, hasHighlights: boolean): string {
  if (!hasHighlights) {
    return clearBackgrounds(markup);
  }

  return markup.replace(CONTAINER_TAG, (tag) => clearBackgrounds(tag));
}

/**
 * Give the gutter `<pre>` the code column's line height so numbers line up
 * with their lines. Applied once; a gutter `<pre>` that already has a style
 * is left as is.
 */
export function alignLineNumberGutter(markup: string): string {
  return markup.replace(GUTTER_PRE, `$1 style="line-height: ${LINE_HEIGHT};">`);
}

