/**
 * SVG Formatter
 *
 * Lays out highlighted lines as one `<text>` per line with a right-aligned
 * line-number label in front of it:
 *
 *   <text x="48" y="14" fill="#90908a" text-anchor="end">1</text><text x="64" y="14" xml:space="preserve">...</text>
 *
 * Baselines start at the font size and advance by floor(1.2 × font size).
 * The label column is three line-steps wide.
 */

import { escapeMarkup } from './escape.js';
import type { HighlightedCode, StyledToken } from './shiki-service.js';

export interface SvgFormatOptions {
  fontFamily: string;
  fontSize: number;
}

/** Average advance of a monospace glyph relative to the font size. */
const CHAR_WIDTH_RATIO = 0.6;

export interface SvgLayout {
  lineStep: number;
  labelX: number;
  contentX: number;
  width: number;
  height: number;
}

export function computeSvgLayout(code: HighlightedCode, fontSize: number): SvgLayout {
  const lineStep = Math.floor(fontSize * 1.2);
  const labelX = 3 * lineStep;
  const contentX = labelX + lineStep;
  const columns = Math.max(
    0,
    ...code.lines.map((line) => line.reduce((sum, token) => sum + token.content.length, 0))
  );
  const lineCount = Math.max(code.lines.length, 1);

  return {
    lineStep,
    labelX,
    contentX,
    width: contentX + Math.ceil(columns * fontSize * CHAR_WIDTH_RATIO) + lineStep,
    height: fontSize + (lineCount - 1) * lineStep + Math.ceil(fontSize / 2),
  };
}

function renderToken(token: StyledToken): string {
  const text = escapeMarkup(token.content);
  const attrs: string[] = [];
  if (token.color) attrs.push(`fill="${token.color}"`);
  if (token.italic) attrs.push('font-style="italic"');
  if (token.bold) attrs.push('font-weight="bold"');
  if (token.underline) attrs.push('text-decoration="underline"');

  if (attrs.length === 0 || token.content.trim().length === 0) {
    return text;
  }
  return `<tspan ${attrs.join(' ')}>${text}</tspan>`;
}

/**
 * Render highlighted code as a standalone, line-numbered SVG document.
 */
export function renderSvg(code: HighlightedCode, options: SvgFormatOptions): string {
  const { fontFamily, fontSize } = options;
  const layout = computeSvgLayout(code, fontSize);

  const rows = code.lines.map((tokens, index) => {
    const y = fontSize + index * layout.lineStep;
    const label =
      `<text x="${layout.labelX}" y="${y}" fill="${code.lineNumberColor}" text-anchor="end">` +
      `${index + 1}</text>`;
    const content =
      `<text x="${layout.contentX}" y="${y}" xml:space="preserve">` +
      `${tokens.map(renderToken).join('')}</text>`;
    return label + content;
  });

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.width}" height="${layout.height}" ` +
      `style="background-color: ${code.background}">`,
    `<g font-family="${escapeMarkup(fontFamily)}" font-size="${fontSize}px" fill="${code.foreground}">`,
    ...rows,
    '</g>',
    '</svg>',
    '',
  ].join('\n');
}
