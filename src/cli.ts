/**
 * CLI Argument Parsing and Help
 *
 * Handles command-line argument parsing, help text, output-format detection
 * and reading the snippet from a file or stdin.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import chalk from 'chalk';
import { RenderError, UnsupportedFormatError, ValidationError } from './errors/index.js';
import { logger } from './integrations/utilities/logger.js';
import { OutputFormatSchema } from './config/schema.js';
import type { OutputFormat } from './types.js';
import { DEFAULT_FONT_FAMILY, DEFAULT_FONT_SIZE, DEFAULT_STYLE } from './defaults.js';

export const VERSION = '1.0.0';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  help: boolean;
  version: boolean;
  debug: boolean;
  listStyles: boolean;
  listLanguages: boolean;
  input?: string;
  output?: string;
  format?: OutputFormat;
  language?: string;
  style?: string;
  font?: string;
  fontSize?: number;
  /** Set by --opaque-background */
  opaqueBackground: boolean;
  /** Raw line spec, parsed later so errors surface before rendering */
  highlightLines?: string;
  highlightColor?: string;
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new ValidationError(`argument ${flag}: expected one argument`, [flag]);
  }
  return value;
}

function parseFormat(value: string): OutputFormat {
  const result = OutputFormatSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new UnsupportedFormatError(value);
  }
  return result.data;
}

function parseFontSize(value: string, flag: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`argument ${flag}: invalid int value: '${value}'`, [flag]);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse command-line arguments (without the node/script prefix).
 *
 * @throws ValidationError - unknown option or missing option value
 * @throws UnsupportedFormatError - --format other than svg or html
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    listStyles: false,
    listLanguages: false,
    opaqueBackground: false,
  };

  for (let i = 0; i < args.length; i++) {
    const raw = args[i];
    // --flag=value is accepted as well as --flag value
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const arg = eq === -1 ? raw : raw.slice(0, eq);
    const value = (): string => (eq === -1 ? takeValue(args, ++i, arg) : raw.slice(eq + 1));

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--list-styles') {
      result.listStyles = true;
    } else if (arg === '--list-languages') {
      result.listLanguages = true;
    } else if (arg === '--input' || arg === '-i') {
      result.input = value();
    } else if (arg === '--output' || arg === '-o') {
      result.output = value();
    } else if (arg === '--format' || arg === '-f') {
      result.format = parseFormat(value());
    } else if (arg === '--language' || arg === '-l') {
      result.language = value();
    } else if (arg === '--style' || arg === '-s') {
      result.style = value();
    } else if (arg === '--font') {
      result.font = value();
    } else if (arg === '--font-size') {
      result.fontSize = parseFontSize(value(), arg);
    } else if (arg === '--opaque-background') {
      result.opaqueBackground = true;
    } else if (arg === '--highlight-lines' || arg === '-H') {
      result.highlightLines = value();
    } else if (arg === '--highlight-color') {
      result.highlightColor = value();
    } else {
      throw new ValidationError(`unrecognized arguments: ${raw}`, [raw]);
    }
  }

  return result;
}

/**
 * Pick the output format: explicit flag, then the output extension, then
 * the configured default. An unknown extension with nothing configured
 * falls back to SVG with a warning.
 */
export function resolveFormat(
  output: string,
  explicit?: OutputFormat,
  configured?: OutputFormat,
): OutputFormat {
  if (explicit) {
    return explicit;
  }

  const ext = extname(output).toLowerCase();
  if (ext === '.html' || ext === '.htm') {
    return 'html';
  }
  if (ext === '.svg') {
    return 'svg';
  }
  if (configured) {
    return configured;
  }

  logger.warn('Unknown extension, defaulting to SVG', { output });
  return 'svg';
}

/**
 * Read the snippet from `input`, or from stdin when no file is given.
 *
 * @throws RenderError - when the input file cannot be read
 */
export async function readInput(input?: string): Promise<string> {
  if (input) {
    try {
      return await readFile(input, 'utf-8');
    } catch (err) {
      throw RenderError.fromError(err, 'read', { path: input });
    }
  }

  if (process.stdin.isTTY) {
    logger.info('Enter your code (press Ctrl+D when finished):');
  }

  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Print a numbered list, as used by --list-styles and --list-languages.
 */
export function showList(title: string, items: string[]): void {
  const width = String(items.length).length;
  const lines = items.map((item, i) => `  ${chalk.dim(String(i + 1).padStart(width))}. ${item}`);
  logger.info(`${chalk.bold(`${title} (${items.length} total):`)}\n\n${lines.join('\n')}\n`);
}

/**
 * Display help text.
 */
export function showHelp(): void {
  logger.info(`
${chalk.bold('snipshot')} ${chalk.dim(`v${VERSION}`)}
Convert code snippets to SVG or HTML with syntax highlighting and line numbers.

${chalk.bold('USAGE')}
  snipshot -o <file> [options]

${chalk.bold('OPTIONS')}
  ${chalk.cyan('-i, --input <file>')}          Input file (reads stdin when omitted)
  ${chalk.cyan('-o, --output <file>')}         Output file path (.svg or .html)
  ${chalk.cyan('-f, --format <svg|html>')}     Output format (default: from output extension)
  ${chalk.cyan('-l, --language <name>')}       Language (auto-detected when omitted)
  ${chalk.cyan('-s, --style <name>')}          Color theme (default: ${DEFAULT_STYLE})
  ${chalk.cyan('--font <family>')}             Font family (default: ${DEFAULT_FONT_FAMILY})
  ${chalk.cyan('--font-size <px>')}            Font size in pixels (default: ${DEFAULT_FONT_SIZE})
  ${chalk.cyan('--opaque-background')}         Keep the theme background (default: transparent)
  ${chalk.cyan('-H, --highlight-lines <spec>')} Lines to emphasize, e.g. "8-10 15"
  ${chalk.cyan('--highlight-color <hex>')}     Highlight color (default: #ffffcc)
  ${chalk.cyan('--list-styles')}               List available styles and exit
  ${chalk.cyan('--list-languages')}            List available languages and exit
  ${chalk.cyan('--debug')}                     Verbose logging
  ${chalk.cyan('-h, --help')}                  Show this help
  ${chalk.cyan('-v, --version')}               Show version

${chalk.bold('EXAMPLES')}
  ${chalk.dim('# Generate SVG from stdin with a specific style')}
  cat script.py | snipshot -o output.svg -l python -s github-dark

  ${chalk.dim('# Generate HTML from a file')}
  snipshot -i script.py -o output.html

  ${chalk.dim('# Emphasize lines 8 to 10 and 15 in light blue')}
  snipshot -i script.py -o output.svg -H "8-10 15" --highlight-color "#cce5ff"

  ${chalk.dim('# Keep the theme background')}
  snipshot -i script.js -o output.svg --opaque-background

Config defaults are read from ~/.config/snipshot/config.json and .snipshot/config.json.
`);
}
