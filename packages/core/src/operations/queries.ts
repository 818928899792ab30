// packages/core/src/operations/queries.ts
import type { Repository } from "../models/repository.js";
import type { RepositoryHandle, StatusScope, VcsProvider } from "../vcs/types.js";

export type QueryResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export type RepositoryQuery<T> = (repo: Repository) => Promise<QueryResult<T>>;

/**
 * Open the repository and run `query` against it. Never rejects: failing to
 * open or query the repository is reported as an unsuccessful result.
 */
function withRepository<T>(
  vcs: VcsProvider,
  query: (handle: RepositoryHandle) => Promise<T>,
): RepositoryQuery<T> {
  return async (repo) => {
    try {
      const handle = await vcs.openRepository(repo.path);
      if (handle === null) {
        return { success: false, error: "not a git repository" };
      }
      return { success: true, data: await query(handle) };
    } catch (error) {
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  };
}

export function statusOperation(
  vcs: VcsProvider,
  scope: StatusScope,
  includeUntracked: boolean,
): RepositoryQuery<string[]> {
  return withRepository(vcs, (handle) =>
    handle.statusLines({ scope, includeUntracked }),
  );
}

export function stashOperation(vcs: VcsProvider): RepositoryQuery<string[]> {
  return withRepository(vcs, (handle) => handle.stashEntries());
}

export function aheadOperation(vcs: VcsProvider): RepositoryQuery<boolean> {
  return withRepository(vcs, (handle) => handle.isAheadOfRemote());
}
