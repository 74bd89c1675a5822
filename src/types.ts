/**
 * Shared types for the snippet renderer.
 */

export type OutputFormat = 'svg' | 'html';

/**
 * Everything one render needs. Built once per run from defaults, config
 * files and CLI flags; never mutated afterwards.
 */
export interface RenderConfig {
  format: OutputFormat;
  /** Language id or alias; auto-detected when absent */
  language?: string;
  /** Theme name */
  style: string;
  fontFamily: string;
  /** Font size in px */
  fontSize: number;
  /** Clear solid backgrounds so the output composites over anything */
  transparent: boolean;
  /** 1-based, ascending, unique */
  lines: number[];
  /** Highlight tint; SVG falls back to pale yellow, HTML keeps the theme's */
  highlightColor?: string;
}

/**
 * Result of rendering a snippet, before it is written anywhere.
 */
export interface RenderResult {
  content: string;
  format: OutputFormat;
  /** Language actually used, after aliasing or detection */
  language: string;
  style: string;
}
