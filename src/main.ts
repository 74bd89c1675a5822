/**
 * snipshot - code snippets to SVG/HTML
 *
 * Wires the CLI together: arguments ─► config ─► line spec ─► input
 * ─► render ─► file. Every failure ends the run with one message on stderr
 * and a non-zero exit code.
 */

import { parseArgs, readInput, resolveFormat, showHelp, showList, VERSION } from './cli.js';
import { buildRenderConfig, loadConfig } from './config/index.js';
import { parseLineSpec } from './core/index.js';
import { MissingOutputPathError, wrapError } from './errors/index.js';
import { ConsoleSink, configureLogger, logger } from './integrations/utilities/logger.js';
import { codeToImage } from './render.js';
import { listLanguages, listStyles } from './syntax/index.js';

export interface MainOptions {
  /** Working directory for project config lookup */
  cwd?: string;
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  try {
    const args = parseArgs(argv);

    if (args.debug) {
      configureLogger({ level: 'debug', sinks: [new ConsoleSink()] });
    }

    if (args.help) {
      showHelp();
      return 0;
    }
    if (args.version) {
      logger.info(`snipshot v${VERSION}`);
      return 0;
    }
    if (args.listStyles) {
      showList('Available styles', listStyles());
      return 0;
    }
    if (args.listLanguages) {
      showList('Available languages', listLanguages());
      return 0;
    }

    if (!args.output) {
      throw new MissingOutputPathError();
    }

    // Reject a bad line spec before reading input or rendering anything
    const lines = parseLineSpec(args.highlightLines);

    const { config: fileConfig, warnings } = loadConfig({ cwd: options.cwd });
    for (const warning of warnings) {
      logger.warn(warning);
    }

    const config = buildRenderConfig(fileConfig, {
      format: resolveFormat(args.output, args.format, fileConfig.format),
      language: args.language,
      style: args.style,
      fontFamily: args.font,
      fontSize: args.fontSize,
      transparent: args.opaqueBackground ? false : undefined,
      lines,
      highlightColor: args.highlightColor,
    });
    logger.debug('Render config', { ...config });

    const code = await readInput(args.input);
    await codeToImage(code, args.output, config);
    return 0;
  } catch (err) {
    const error = wrapError(err);
    logger.debug(error.toLogString(), { error: error.toJSON() });
    logger.error(error.message);
    return 1;
  }
}
