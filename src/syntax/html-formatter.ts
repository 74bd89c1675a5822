/**
 * HTML Formatter
 *
 * Emits an inline-styled table fragment (no <html>/<head>) so it can be
 * pasted into tools that strip stylesheets: a line-number column and a code
 * column. Requested lines are wrapped in a span carrying the theme's
 * current-line tint. The gutter `<pre>` is emitted bare; its line height is
 * set during post-processing.
 */

import { LINE_HEIGHT } from '../core/html-injector.js';
import { escapeMarkup } from './escape.js';
import type { HighlightedCode, StyledToken } from './shiki-service.js';

export interface HtmlFormatOptions {
  fontFamily: string;
  fontSize: number;
  /** 1-based lines to mark as highlighted */
  highlightLines?: readonly number[];
}

function renderToken(token: StyledToken): string {
  const text = escapeMarkup(token.content);
  const styles: string[] = [];
  if (token.color) styles.push(`color: ${token.color}`);
  if (token.italic) styles.push('font-style: italic');
  if (token.bold) styles.push('font-weight: bold');
  if (token.underline) styles.push('text-decoration: underline');

  return styles.length > 0 ? `<span style="${styles.join('; ')}">${text}</span>` : text;
}

/**
 * Render highlighted code as a line-numbered HTML fragment.
 */
export function renderHtml(code: HighlightedCode, options: HtmlFormatOptions): string {
  const { fontFamily, fontSize } = options;
  const highlighted = new Set(options.highlightLines ?? []);
  const font = `font-family: ${escapeMarkup(fontFamily)}; font-size: ${fontSize}px`;

  const numbers = code.lines
    .map(
      (_tokens, index) =>
        `<span style="color: ${code.lineNumberColor}; padding-left: 5px; padding-right: 5px">` +
        `${index + 1}</span>`
    )
    .join('\n');

  const body = code.lines
    .map((tokens, index) => {
      const line = tokens.map(renderToken).join('') + '\n';
      return highlighted.has(index + 1)
        ? `<span style="background-color: ${code.lineHighlight}">${line}</span>`
        : line;
    })
    .join('');

  return (
    `<div class="highlight" style="background: ${code.background}">` +
    '<table class="highlighttable"><tr>' +
    `<td class="linenos"><div class="linenodiv" style="${font}"><pre>` +
    `${numbers}\n</pre></div></td>` +
    `<td class="code"><div><pre style="line-height: ${LINE_HEIGHT}; margin: 0; ${font}; ` +
    `color: ${code.foreground}">` +
    `${body}</pre></div></td>` +
    '</tr></table></div>\n'
  );
}
