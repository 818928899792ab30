// packages/core/src/models/repository.ts
import { basename } from "path";

/** Name of the metadata directory that marks a working tree root */
export const METADATA_DIR = ".git";

/**
 * A git repository, identified by the canonical path to its working tree
 * root (not its `.git` directory).
 */
export class Repository {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
    Object.freeze(this);
  }

  get name(): string {
    return basename(this.path);
  }

  equals(other: Repository): boolean {
    return this.path === other.path;
  }

  toString(): string {
    return this.path;
  }
}

export function compareRepositories(a: Repository, b: Repository): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}
