/**
 * Default rendering settings. Config files and CLI flags override these.
 */

export const DEFAULT_STYLE = 'monokai';
export const DEFAULT_FONT_FAMILY = 'monospace';
export const DEFAULT_FONT_SIZE = 14;

export const DEFAULT_SETTINGS = {
  style: DEFAULT_STYLE,
  fontFamily: DEFAULT_FONT_FAMILY,
  fontSize: DEFAULT_FONT_SIZE,
  transparent: true,
} as const;
