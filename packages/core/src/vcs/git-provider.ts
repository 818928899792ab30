// packages/core/src/vcs/git-provider.ts
import { simpleGit, CheckRepoActions, type SimpleGit } from "simple-git";
import { formatShortStatusLines } from "./short-status.js";
import type { RepositoryHandle, StatusOptions, VcsProvider } from "./types.js";

class GitRepositoryHandle implements RepositoryHandle {
  constructor(
    readonly path: string,
    private readonly git: SimpleGit,
  ) {}

  async statusLines(options: StatusOptions): Promise<string[]> {
    const status = await this.git.status();
    return formatShortStatusLines(status.files, options);
  }

  async stashEntries(): Promise<string[]> {
    const stashes = await this.git.stashList();
    return stashes.all.map((entry, n) => `stash@{${n}}: ${entry.message}`);
  }

  async isAheadOfRemote(): Promise<boolean> {
    // Commits reachable from a local branch but from no remote-tracking
    // branch; any output means some local tip is unpushed.
    const output = await this.git.raw([
      "rev-list",
      "--branches",
      "--not",
      "--remotes",
      "--max-count=1",
    ]);
    return output.trim().length > 0;
  }
}

/**
 * VcsProvider backed by the git executable, through simple-git.
 */
export class GitVcsProvider implements VcsProvider {
  async openRepository(path: string): Promise<RepositoryHandle | null> {
    let git: SimpleGit;
    try {
      git = simpleGit(path);
    } catch {
      // simple-git refuses directories that do not exist
      return null;
    }

    try {
      const isRoot = await git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
      return isRoot ? new GitRepositoryHandle(path, git) : null;
    } catch {
      return null;
    }
  }
}
