import path from 'node:path';

/**
 * Platform metadata that never belongs in a mirror (macOS Finder, Spotlight,
 * resource forks, trash)
 */
export const DEFAULT_EXCLUSIONS: readonly string[] = [
  '.DS_Store',
  '__MACOSX',
  '.AppleDouble',
  '.LSOverride',
  '.Spotlight-V100',
  '.Trashes',
  '.fseventsd',
];

/**
 * Builds the read-only exclusion set for a run
 */
export function buildExclusionSet(extra: readonly string[] = []): ReadonlySet<string> {
  const names = new Set<string>(DEFAULT_EXCLUSIONS);
  for (const name of extra) {
    if (name.length > 0) {
      names.add(name);
    }
  }
  return names;
}

/**
 * Exact, case-sensitive name match
 */
export function isExcludedName(name: string, exclusions: ReadonlySet<string>): boolean {
  return exclusions.has(name);
}

/**
 * True if any component of a path relative to the source root is excluded
 */
export function isExcludedPath(relativePath: string, exclusions: ReadonlySet<string>): boolean {
  return relativePath
    .split(path.sep)
    .some(part => part.length > 0 && isExcludedName(part, exclusions));
}

