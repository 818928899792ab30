// packages/core/src/vcs/types.ts

/**
 * Which side of a repository's status to report.
 * - index: staged changes
 * - workdir: unstaged changes in the working tree
 * - both: `git status -s`
 */
export type StatusScope = "index" | "workdir" | "both";

export interface StatusOptions {
  scope: StatusScope;
  includeUntracked: boolean;
}

/**
 * An opened repository. Every query runs against the working tree it was
 * opened at.
 */
export interface RepositoryHandle {
  readonly path: string;
  /** Short-format status lines, `XY path` */
  statusLines(options: StatusOptions): Promise<string[]>;
  /** Stash entries, `stash@{n}: <message>` */
  stashEntries(): Promise<string[]>;
  /** True if some local branch tip is not reachable from any remote branch */
  isAheadOfRemote(): Promise<boolean>;
}

/**
 * The version-control capability gitfleet is built on.
 */
export interface VcsProvider {
  /**
   * Open the repository whose working tree root is `path`.
   * Returns null when `path` is not the root of a usable repository.
   */
  openRepository(path: string): Promise<RepositoryHandle | null>;
}
