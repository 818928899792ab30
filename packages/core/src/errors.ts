// packages/core/src/errors.ts

/**
 * The repository cache could not be created or written. Fatal for the
 * current invocation.
 */
export class CacheWriteError extends Error {
  constructor(
    public readonly cacheFile: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write cache file ${cacheFile}: ${reason}`, { cause });
    this.name = "CacheWriteError";
  }
}

/**
 * The ignore list file could not be created or appended to.
 */
export class IgnoreListError extends Error {
  constructor(
    public readonly ignoreFile: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not update ignore file ${ignoreFile}: ${reason}`, { cause });
    this.name = "IgnoreListError";
  }
}

export class AlreadyIgnoredError extends Error {
  constructor(public readonly path: string) {
    super(`${path} is already ignored`);
    this.name = "AlreadyIgnoredError";
  }
}
