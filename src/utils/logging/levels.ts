/**
 * Severity levels understood by the shared logger.
 *
 * These are pino's built-in levels, listed most severe first. The names are
 * matched case-insensitively and `warning` is accepted as an alias of `warn`.
 */

import type { Level } from 'pino';
import { InvalidLevelError } from './errors.js';

export const LEVEL_NAMES = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
] as const satisfies readonly Level[];

export type LevelName = (typeof LEVEL_NAMES)[number];

const LEVEL_ALIASES: Record<string, LevelName> = {
  warning: 'warn',
};

export function normalizeLevelName(name: string): string {
  const lowered = name.trim().toLowerCase();
  return LEVEL_ALIASES[lowered] ?? lowered;
}

export function isLevelName(name: string): name is LevelName {
  return LEVEL_NAMES.some((level) => level === name);
}

/**
 * Resolve a user-supplied level name.
 *
 * @throws InvalidLevelError if the name is not a known level
 */
export function parseLevel(name: string): LevelName {
  const normalized = normalizeLevelName(name);
  if (!isLevelName(normalized)) {
    throw new InvalidLevelError(name);
  }
  return normalized;
}
