/**
 * Unified Configuration Loader
 *
 * Loads rendering defaults from user-level (~/.config/snipshot/config.json)
 * and project-level (.snipshot/config.json) sources, and merges them with
 * CLI flags into the RenderConfig of one run.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_SETTINGS } from '../defaults.js';
import { ValidationError } from '../errors/index.js';
import { getConfigPath, getProjectDir } from '../paths.js';
import type { RenderConfig } from '../types.js';
import { RenderConfigSchema, UserConfigSchema, type ValidatedUserConfig } from './schema.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged and validated config */
  config: ValidatedUserConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
  /** Non-fatal problems: unreadable files, invalid entries */
  warnings: string[];
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null.
 * Collects parse errors as warnings.
 */
function loadJsonFile(filePath: string, warnings: string[]): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      warnings.push(
        `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      );
      return null;
    }

    return { ...parsed };
  } catch (err) {
    warnings.push(`${filePath}: failed to parse JSON — ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Validate a merged config. Invalid or unknown entries become warnings and
 * are dropped; the rest is kept.
 */
function validateUserConfig(raw: Record<string, unknown>, warnings: string[]): ValidatedUserConfig {
  const result = UserConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const rejected = new Set<string>();
  for (const issue of result.error.issues) {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    warnings.push(`config validation: ${path} — ${issue.message}`);

    if (issue.path.length > 0) {
      rejected.add(String(issue.path[0]));
    }
    if (issue.code === 'unrecognized_keys') {
      issue.keys.forEach((key) => rejected.add(key));
    }
  }

  const kept = Object.fromEntries(Object.entries(raw).filter(([key]) => !rejected.has(key)));
  const retry = UserConfigSchema.safeParse(kept);
  return retry.success ? retry.data : {};
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: user ← project (project overrides user).
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false } = options;
  const warnings: string[] = [];
  const sources: ConfigLoadResult['sources'] = [];

  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath, warnings);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  let projectRaw: Record<string, unknown> | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath, warnings);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  const merged = { ...userRaw, ...projectRaw };
  return { config: validateUserConfig(merged, warnings), sources, warnings };
}

// =============================================================================
// RENDER CONFIG
// =============================================================================

/**
 * Per-run settings given on the command line. `format` is always known by
 * the time a config is built; everything else may fall back to files and
 * defaults.
 */
export type RenderOverrides = Partial<Omit<RenderConfig, 'format'>> & {
  format?: RenderConfig['format'];
};

/**
 * Merge defaults ← config file ← CLI overrides into a validated RenderConfig.
 *
 * @throws ValidationError - when the merged settings are invalid
 */
export function buildRenderConfig(
  fileConfig: ValidatedUserConfig,
  overrides: RenderOverrides,
): RenderConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );

  const result = RenderConfigSchema.safeParse({
    format: 'svg',
    lines: [],
    ...DEFAULT_SETTINGS,
    ...fileConfig,
    ...defined,
  });

  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}
