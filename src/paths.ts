/**
 * XDG Base Directory compliant paths for snipshot.
 *
 * - Config: ~/.config/snipshot/ (or $XDG_CONFIG_HOME/snipshot/)
 *   User-wide rendering defaults
 *
 * - Project: .snipshot/
 *   Project-specific defaults in the current working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

export const APP_NAME = 'snipshot';

/**
 * Get the configuration directory path.
 * Uses $XDG_CONFIG_HOME if set, otherwise defaults to ~/.config/snipshot/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_NAME) : join(homedir(), '.config', APP_NAME);
}

/**
 * Get the project-specific directory path (.snipshot/ within `cwd`).
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_NAME}`);
}

/**
 * Get the path to the user configuration file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}
