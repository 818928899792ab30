// packages/core/src/vcs/short-status.ts
import type { StatusOptions } from "./types.js";

/**
 * One file entry of a porcelain status, as reported by simple-git.
 * `index` and `working_dir` hold a single status letter each.
 */
export interface FileStatusEntry {
  path: string;
  index: string;
  working_dir: string;
  from?: string;
}

const UNCHANGED = " ";
const UNTRACKED = "?";
const IGNORED = "!";

function displayPath(entry: FileStatusEntry): string {
  return entry.from ? `${entry.from} -> ${entry.path}` : entry.path;
}

function isUntracked(entry: FileStatusEntry): boolean {
  return entry.index === UNTRACKED || entry.working_dir === UNTRACKED;
}

/**
 * Render one entry in `git status -s` notation for the requested scope.
 * Returns null when the entry has nothing to show on that side.
 */
export function formatShortStatus(
  entry: FileStatusEntry,
  options: StatusOptions,
): string | null {
  const index = entry.index || UNCHANGED;
  const workdir = entry.working_dir || UNCHANGED;

  if (index === IGNORED || workdir === IGNORED) return null;

  if (isUntracked(entry)) {
    if (!options.includeUntracked || options.scope === "index") return null;
    return `${UNTRACKED}${UNTRACKED} ${displayPath(entry)}`;
  }

  switch (options.scope) {
    case "index":
      if (index === UNCHANGED) return null;
      return `${index}${UNCHANGED} ${displayPath(entry)}`;
    case "workdir":
      if (workdir === UNCHANGED) return null;
      return `${UNCHANGED}${workdir} ${displayPath(entry)}`;
    case "both":
      if (index === UNCHANGED && workdir === UNCHANGED) return null;
      return `${index}${workdir} ${displayPath(entry)}`;
  }
}

export function formatShortStatusLines(
  entries: readonly FileStatusEntry[],
  options: StatusOptions,
): string[] {
  const lines: string[] = [];
  for (const entry of entries) {
    const line = formatShortStatus(entry, options);
    if (line !== null) lines.push(line);
  }
  return lines;
}
