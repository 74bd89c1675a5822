/**
 * SVG Line Highlighting
 *
 * Places a translucent rectangle behind each requested line of a
 * line-numbered SVG. Line-number labels are the right-aligned
 * `<text text-anchor="end">` elements; code content is left-aligned and
 * carries no anchor. Each label's `y` is the baseline of its line.
 */

import {
  DEFAULT_HIGHLIGHT_COLOR,
  clearBackgrounds,
  formatNumber,
  readNumericAttribute,
} from './markup.js';

export const DEFAULT_FONT_SIZE = 14;
export const DEFAULT_SVG_WIDTH = 800;

/** Band height as a multiple of the font size. */
const BAND_HEIGHT_RATIO = 1.2;
/** Distance from baseline to band top as a multiple of the font size. */
const BAND_ASCENT_RATIO = 0.85;
const BAND_OPACITY = 0.3;

const LABEL_TAG = /<text\b[^>]*\stext-anchor="end"[^>]*>/g;
const FONT_SIZE = /font-size\s*[:=]\s*"?(\d+(?:\.\d+)?)/;
const SVG_ROOT_TAG = /<svg\b[^>]*>/;

/**
 * A line-number label found in the markup.
 */
export interface LabelOccurrence {
  /** Offset of the label's `<text` in the markup */
  offset: number;
  /** Baseline y coordinate */
  y: number;
}

/**
 * Geometry read from the markup.
 */
export interface SvgMetrics {
  fontSize: number;
  width: number;
}

/**
 * Find line-number labels in document order. Labels without a numeric `y`
 * are skipped.
 */
export function findLabelOccurrences(markup: string): LabelOccurrence[] {
  const labels: LabelOccurrence[] = [];

  for (const match of markup.matchAll(LABEL_TAG)) {
    const y = readNumericAttribute(match[0], 'y');
    if (y !== undefined && match.index !== undefined) {
      labels.push({ offset: match.index, y });
    }
  }

  return labels;
}

export function readSvgMetrics(markup: string): SvgMetrics {
  const fontMatch = markup.match(FONT_SIZE);
  const rootTag = markup.match(SVG_ROOT_TAG)?.[0];

  return {
    fontSize: fontMatch ? Number.parseFloat(fontMatch[1]) : DEFAULT_FONT_SIZE,
    width: (rootTag && readNumericAttribute(rootTag, 'width')) || DEFAULT_SVG_WIDTH,
  };
}

/**
 * Build the highlight rectangle for a line whose baseline is at `y`.
 */
export function highlightRect(y: number, metrics: SvgMetrics, color: string): string {
  const top = y - BAND_ASCENT_RATIO * metrics.fontSize;
  const height = BAND_HEIGHT_RATIO * metrics.fontSize;
  return (
    `<rect x="0" y="${formatNumber(top)}" width="${formatNumber(metrics.width)}" ` +
    `height="${formatNumber(height)}" fill="${color}" fill-opacity="${BAND_OPACITY}"/>`
  );
}

/**
 * Insert a highlight rectangle before the label of each requested line.
 * Line numbers outside 1..labelCount are ignored. Returns the markup
 * unchanged when there is nothing to highlight or nothing to anchor to.
 */
export function injectSvg(
  markup: string,
  lineNumbers: readonly number[],
  color: string = DEFAULT_HIGHLIGHT_COLOR
): string {
  if (lineNumbers.length === 0) {
    return markup;
  }

  const labels = findLabelOccurrences(markup);
  if (labels.length === 0) {
    return markup;
  }

  const metrics = readSvgMetrics(markup);
  const targets = [...new Set(lineNumbers)]
    .filter((n) => Number.isInteger(n) && n >= 1 && n <= labels.length)
    .map((n) => labels[n - 1])
    // Highest offset first so earlier offsets stay valid
    .sort((a, b) => b.offset - a.offset);

  let result = markup;
  for (const label of targets) {
    result =
      result.slice(0, label.offset) + highlightRect(label.y, metrics, color) + result.slice(label.offset);
  }

  return result;
}

/**
 * Swap solid background declarations for `transparent`. Rectangle fills are
 * attributes, not background declarations, so highlights are left alone.
 */
export function makeSvgTransparent(markup: string): string {
  return clearBackgrounds(markup);
}
