/**
 * Small helpers shared by the SVG and HTML injectors.
 */

/** Default highlight tint: pale yellow. */
export const DEFAULT_HIGHLIGHT_COLOR = '#ffffcc';

/** `background: #abc` or `background-color: #aabbcc`, capturing the property. */
export const BACKGROUND_HEX = /(background(?:-color)?)\s*:\s*#[0-9a-fA-F]+/g;

/**
 * Replace every background hex declaration in `text` with `transparent`,
 * keeping the property name as written.
 */
export function clearBackgrounds(text: string): string {
  return text.replace(BACKGROUND_HEX, (_match, property: string) => `${property}: transparent`);
}

/**
 * Render a coordinate with at most two decimals and no trailing zeros,
 * so 1.2 * 14 prints as 16.8 rather than 16.799999999999997.
 */
export function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}

/**
 * Read a numeric attribute value out of a single start tag.
 */
export function readNumericAttribute(tag: string, name: string): number | undefined {
  const match = tag.match(new RegExp(`\\s${name}="(-?\\d+(?:\\.\\d+)?)(?:px)?"`));
  return match ? Number.parseFloat(match[1]) : undefined;
}
