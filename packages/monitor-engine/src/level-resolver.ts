import { LevelEntry } from './types.js';

export const DEFAULT_LEVEL = 'default';

export const DEFAULT_LEVELS: readonly LevelEntry[] = [{ level: DEFAULT_LEVEL }];

export function levelEntry(level: string, environment?: string): LevelEntry {
  return environment === undefined ? { level } : { level, environment };
}

/**
 * Effective criticality level for `environment`.
 *
 * A list holding only an environment-less entry applies everywhere. Otherwise
 * only entries registered for the environment count, the last registered one
 * winning, and anything unmatched falls back to {@link DEFAULT_LEVEL}.
 */
export function resolveLevel(levels: readonly LevelEntry[], environment?: string): string {
  const [only] = levels;
  if (levels.length === 1 && only !== undefined && only.environment === undefined) {
    return only.level;
  }

  const matches = levels.filter(
    (entry) => entry.environment !== undefined && entry.environment === environment,
  );

  const last = matches[matches.length - 1];
  return last === undefined ? DEFAULT_LEVEL : last.level;
}

export function registerLevel(
  levels: readonly LevelEntry[],
  level: string,
  environment?: string,
): LevelEntry[] {
  const withoutLevel = levels.filter((entry) => entry.level !== level);

  if (environment !== undefined) {
    return [...withoutLevel, levelEntry(level, environment)];
  }

  // A new environment-less level supersedes the current default.
  return [...withoutLevel.filter((entry) => entry.environment !== undefined), { level }];
}

export function registerLevels(
  base: readonly LevelEntry[],
  entries: readonly LevelEntry[],
): LevelEntry[] {
  return entries.reduce<LevelEntry[]>(
    (levels, entry) => registerLevel(levels, entry.level, entry.environment),
    [...base],
  );
}
