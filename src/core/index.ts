/**
 * Markup post-processing: line ranges in, highlighted markup out.
 */

import type { RenderConfig } from '../types.js';
import { alignLineNumberGutter, injectHtml, makeHtmlTransparent } from './html-injector.js';
import { injectSvg, makeSvgTransparent } from './svg-injector.js';
import { DEFAULT_HIGHLIGHT_COLOR } from './markup.js';

export { parseLineSpec, formatLineSet } from './line-ranges.js';
export {
  injectSvg,
  makeSvgTransparent,
  findLabelOccurrences,
  readSvgMetrics,
  highlightRect,
  type LabelOccurrence,
  type SvgMetrics,
} from './svg-injector.js';
export { injectHtml, makeHtmlTransparent, alignLineNumberGutter, LINE_HEIGHT } from './html-injector.js';
export { DEFAULT_HIGHLIGHT_COLOR, clearBackgrounds, formatNumber } from './markup.js';

type HighlightOptions = Pick<RenderConfig, 'format' | 'lines' | 'highlightColor' | 'transparent'>;

/**
 * Run the post-processing steps for the configured format in order.
 * Transparency always comes last so it sees the injected highlights.
 */
export function applyHighlights(markup: string, options: HighlightOptions): string {
  const { format, lines, highlightColor, transparent } = options;

  if (format === 'svg') {
    const highlighted = injectSvg(markup, lines, highlightColor ?? DEFAULT_HIGHLIGHT_COLOR);
    return transparent ? makeSvgTransparent(highlighted) : highlighted;
  }

  const highlighted = injectHtml(alignLineNumberGutter(markup), lines, highlightColor);
  return transparent ? makeHtmlTransparent(highlighted, lines.length > 0) : highlighted;
}
