// packages/core/src/matching/path-matcher.ts
import { realpathSync } from "fs";
import { resolve, sep } from "path";

/**
 * Resolve a path to its absolute, symlink-free form.
 * Returns null when the path cannot be resolved (usually because it no
 * longer exists).
 */
export function tryCanonicalize(path: string): string | null {
  try {
    return realpathSync(path);
  } catch {
    return null;
  }
}

/**
 * Canonical form of a path, or its absolute literal form if it cannot be
 * resolved.
 */
export function canonicalize(path: string): string {
  return tryCanonicalize(path) ?? resolve(path);
}

/**
 * True if `path` is `entry` itself or lies underneath it.
 */
export function isSameOrUnder(path: string, entry: string): boolean {
  if (path === entry) return true;
  const prefix = entry.endsWith(sep) ? entry : entry + sep;
  return path.startsWith(prefix);
}

/**
 * True if the path contains any of the non-empty patterns.
 */
export function matchesIgnorePattern(
  path: string,
  ignorePatterns: readonly string[],
): boolean {
  for (const pattern of ignorePatterns) {
    if (pattern.length > 0 && path.includes(pattern)) return true;
  }
  return false;
}

/**
 * True if the path, or the path it resolves to, is an ignored repository or
 * lies inside one.
 */
export function matchesIgnoredPath(
  path: string,
  ignoredPaths: readonly string[],
): boolean {
  if (ignoredPaths.length === 0) return false;

  const candidates = [path];
  const canonical = tryCanonicalize(path);
  if (canonical !== null && canonical !== path) {
    candidates.push(canonical);
  }

  for (const candidate of candidates) {
    for (const entry of ignoredPaths) {
      if (isSameOrUnder(candidate, entry)) return true;
    }
  }
  return false;
}

/**
 * Decide whether a path is excluded from the repository inventory, either by
 * a substring pattern or by an entry of the ignore list.
 */
export function isExcluded(
  path: string,
  ignorePatterns: readonly string[],
  ignoredPaths: readonly string[],
): boolean {
  return (
    matchesIgnorePattern(path, ignorePatterns) ||
    matchesIgnoredPath(path, ignoredPaths)
  );
}
