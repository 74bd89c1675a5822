/**
 * Language Resolution
 *
 * Maps a requested language (id or alias) onto a grammar Shiki bundles, and
 * falls back to highlight.js auto-detection when none was requested or the
 * request is unknown.
 */

import hljs from 'highlight.js';
import { bundledLanguagesInfo } from 'shiki';
import { logger } from '../integrations/utilities/logger.js';

/** Language used when nothing better is known. */
export const PLAIN_TEXT = 'text';

const PLAIN_TEXT_ALIASES = new Set(['text', 'txt', 'plain', 'plaintext']);

export interface ResolvedLanguage {
  /** Shiki grammar id, or 'text' */
  id: string;
  /** Human-readable name */
  name: string;
  /** How the language was chosen */
  source: 'requested' | 'detected' | 'fallback';
}

/**
 * Look up a Shiki grammar by id or alias (case-insensitive).
 */
export function findLanguage(name: string): { id: string; name: string } | undefined {
  const wanted = name.trim().toLowerCase();
  if (PLAIN_TEXT_ALIASES.has(wanted)) {
    return { id: PLAIN_TEXT, name: 'Text only' };
  }

  const info = bundledLanguagesInfo.find(
    (lang) => lang.id === wanted || (lang.aliases ?? []).includes(wanted)
  );
  return info ? { id: info.id, name: info.name } : undefined;
}

/**
 * Guess the language of `code` with highlight.js. Returns the Shiki match,
 * or undefined when highlight.js has no guess Shiki can load.
 */
export function detectLanguage(code: string): { id: string; name: string } | undefined {
  const guess = hljs.highlightAuto(code).language;
  if (!guess) {
    return undefined;
  }

  const direct = findLanguage(guess);
  if (direct) {
    return direct;
  }

  // highlight.js and Shiki disagree on some ids; try highlight.js aliases
  for (const alias of hljs.getLanguage(guess)?.aliases ?? []) {
    const match = findLanguage(alias);
    if (match) {
      return match;
    }
  }

  return undefined;
}

/**
 * Pick the language to highlight with. An unknown request is a warning, not
 * an error: auto-detection takes over.
 */
export function resolveLanguage(code: string, requested?: string): ResolvedLanguage {
  if (requested) {
    const found = findLanguage(requested);
    if (found) {
      return { ...found, source: 'requested' };
    }
    logger.warn(`Unknown language '${requested}', attempting auto-detection`);
  }

  const detected = detectLanguage(code);
  if (detected) {
    return { ...detected, source: 'detected' };
  }

  return { id: PLAIN_TEXT, name: 'Text only', source: 'fallback' };
}

/**
 * All bundled language ids, sorted.
 */
export function listLanguages(): string[] {
  return bundledLanguagesInfo.map((lang) => lang.id).sort();
}
