// packages/core/src/discovery/discoverer.ts
import { statSync } from "fs";
import { basename, dirname } from "path";
import { globIterate } from "glob";
import { isExcluded, tryCanonicalize } from "../matching/path-matcher.js";
import {
  Repository,
  compareRepositories,
  METADATA_DIR,
} from "../models/repository.js";
import type { FleetConfig } from "../models/config.js";
import type { VcsProvider } from "../vcs/types.js";

/**
 * Hooks for reporting scan progress. Purely cosmetic; the scan result does
 * not depend on them.
 */
export interface DiscoveryProgress {
  onStart?: (scanRoot: string) => void;
  /** Called after each repository is found */
  onProgress?: (found: number, currentPath: string) => void;
  onFinish?: (found: number) => void;
}

export interface DiscovererOptions extends DiscoveryProgress {
  /**
   * Paths excluded the same way as ignored repositories. Usually the
   * persisted ignore list.
   */
  ignoredPaths?: readonly string[];
}

function deviceOf(path: string): number | null {
  try {
    return statSync(path).dev;
  } catch {
    return null;
  }
}

/**
 * Walks a directory tree looking for git repositories.
 */
export class Discoverer {
  private readonly vcs: VcsProvider;
  private readonly options: DiscovererOptions;

  constructor(vcs: VcsProvider, options: DiscovererOptions = {}) {
    this.vcs = vcs;
    this.options = options;
  }

  /**
   * Find every repository under `config.scanRoot`, sorted by path.
   */
  async findRepositories(config: FleetConfig): Promise<Repository[]> {
    const { onStart, onProgress, onFinish } = this.options;
    const ignoredPaths = this.options.ignoredPaths ?? [];
    const scanRoot = config.scanRoot;
    const rootDevice = config.sameFilesystem ? deviceOf(scanRoot) : null;

    onStart?.(scanRoot);

    const isPruned = (fullPath: string): boolean => {
      if (isExcluded(fullPath, config.ignorePatterns, ignoredPaths)) {
        return true;
      }
      if (rootDevice !== null && deviceOf(fullPath) !== rootDevice) {
        return true;
      }
      return false;
    };

    // Canonical directory -> the walked path it was first reached through.
    // A second alias of the same directory (including a symlink cycle back
    // to an ancestor) is not walked again.
    const visited = new Map<string, string>();
    const isAlias = (fullPath: string): boolean => {
      if (!config.followSymlinks) return false;
      const canonical = tryCanonicalize(fullPath);
      if (canonical === null) return false;
      const first = visited.get(canonical);
      if (first === undefined) {
        visited.set(canonical, fullPath);
        return false;
      }
      return first !== fullPath;
    };

    // Keyed by canonical working tree path
    const found = new Map<string, Repository>();

    const matches = globIterate(`**/${METADATA_DIR}`, {
      cwd: scanRoot,
      dot: true,
      follow: config.followSymlinks,
      withFileTypes: true,
      ignore: {
        ignored: (p) => isExcluded(p.fullpath(), config.ignorePatterns, ignoredPaths),
        // Nothing inside a metadata directory is a repository root
        childrenIgnored: (p) =>
          p.name === METADATA_DIR || isPruned(p.fullpath()) || isAlias(p.fullpath()),
      },
    });

    for await (const entry of matches) {
      const metadataDir = entry.fullpath();
      if (basename(metadataDir) !== METADATA_DIR) continue;
      // A .git file (worktree or submodule link) is not a repository root
      if (!entry.isDirectory()) continue;

      const walkedPath = dirname(metadataDir);
      const repoPath = tryCanonicalize(walkedPath) ?? walkedPath;
      if (found.has(repoPath)) continue;

      // Guard against stale or malformed metadata directories
      const handle = await this.vcs.openRepository(repoPath);
      if (handle === null) continue;

      found.set(repoPath, new Repository(repoPath));
      onProgress?.(found.size, repoPath);
    }

    onFinish?.(found.size);

    return [...found.values()].sort(compareRepositories);
  }
}
