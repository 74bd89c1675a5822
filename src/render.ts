/**
 * Render Pipeline
 *
 * code ─► language resolution ─► Shiki tokens ─► SVG/HTML markup
 *      ─► highlight injection ─► file
 */

import { writeFile } from 'node:fs/promises';
import { applyHighlights, formatLineSet } from './core/index.js';
import { EmptyInputError, RenderError } from './errors/index.js';
import { createComponentLogger, logger } from './integrations/utilities/logger.js';
import { highlightCode, renderHtml, renderSvg, resolveLanguage } from './syntax/index.js';
import type { RenderConfig, RenderResult } from './types.js';

/**
 * Render `code` to highlighted markup without touching the filesystem.
 *
 * @throws EmptyInputError - when the code is empty or whitespace only
 * @throws RenderError - when highlighting fails
 */
export async function renderSnippet(code: string, config: RenderConfig): Promise<RenderResult> {
  if (code.trim().length === 0) {
    throw new EmptyInputError();
  }

  const log = createComponentLogger('render');
  const language = resolveLanguage(code, config.language);
  log.debug('Resolved language', { language: language.id, source: language.source });

  const highlighted = await highlightCode(code, { language: language.id, style: config.style });
  const fonts = { fontFamily: config.fontFamily, fontSize: config.fontSize };

  const markup =
    config.format === 'svg'
      ? renderSvg(highlighted, fonts)
      : renderHtml(highlighted, { ...fonts, highlightLines: config.lines });

  if (config.lines.length > 0) {
    const available = highlighted.lines.length;
    const ignored = config.lines.filter((line) => line > available);
    log.debug('Highlighting lines', {
      lines: formatLineSet(config.lines),
      ...(ignored.length > 0 ? { ignored: formatLineSet(ignored) } : {}),
    });
  }

  return {
    content: applyHighlights(markup, config),
    format: config.format,
    language: language.name,
    style: config.style,
  };
}

/**
 * Render `code` and write it to `outputFile` (UTF-8, overwriting).
 *
 * @throws RenderError - when the file cannot be written
 */
export async function codeToImage(
  code: string,
  outputFile: string,
  config: RenderConfig,
): Promise<RenderResult> {
  const result = await renderSnippet(code, config);

  try {
    await writeFile(outputFile, result.content, 'utf-8');
  } catch (err) {
    throw RenderError.fromError(err, 'write', { path: outputFile });
  }

  logger.info(`${result.format.toUpperCase()} saved to: ${outputFile}`);
  logger.info(`Language: ${result.language}`);
  logger.info(`Style: ${result.style}`);

  return result;
}
