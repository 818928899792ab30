// packages/core/src/cache/cache-store.ts
import { readFile, writeFile, mkdir, rename, rm, stat } from "fs/promises";
import { dirname } from "path";
import { CacheWriteError } from "../errors.js";
import { matchesIgnoredPath } from "../matching/path-matcher.js";
import { Repository } from "../models/repository.js";
import type { FleetConfig } from "../models/config.js";
import { fingerprint, parseFingerprint } from "./fingerprint.js";

function isMissing(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Line-oriented repository cache. The first line is the fingerprint of the
 * configuration the cache was built under; every following line is the path
 * of one repository, in sorted order.
 */
export class CacheStore {
  readonly cacheFile: string;

  constructor(cacheFile: string) {
    this.cacheFile = cacheFile;
  }

  /**
   * Cache contents as lines, or null when there is no cache file.
   */
  private async readLines(): Promise<string[] | null> {
    try {
      const content = await readFile(this.cacheFile, "utf-8");
      return content.split(/\r?\n/);
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  /**
   * True if the cache exists and was written under this configuration.
   */
  async isValid(config: FleetConfig): Promise<boolean> {
    let lines: string[] | null;
    try {
      lines = await this.readLines();
    } catch {
      // Unreadable counts as stale
      return false;
    }
    const first = lines?.[0];
    if (first === undefined) return false;

    const stored = parseFingerprint(first);
    return stored !== null && stored === BigInt(fingerprint(config));
  }

  /**
   * Replace the cache with the given repositories, written in the order
   * given. The new contents are written to a sibling file first and then
   * renamed over the cache, so readers never see a partial file.
   */
  async write(config: FleetConfig, repos: readonly Repository[]): Promise<void> {
    const body =
      [fingerprint(config), ...repos.map((repo) => repo.path)].join("\n") + "\n";
    const tempFile = `${this.cacheFile}.${process.pid}.tmp`;

    try {
      await mkdir(dirname(this.cacheFile), { recursive: true });
      await writeFile(tempFile, body, "utf-8");
      await rename(tempFile, this.cacheFile);
    } catch (error) {
      await rm(tempFile, { force: true }).catch(() => undefined);
      throw new CacheWriteError(this.cacheFile, error);
    }
  }

  /**
   * Repositories listed in the cache that still exist and are not ignored.
   * Stale entries are skipped; they do not invalidate the cache.
   */
  async read(ignoredPaths: readonly string[]): Promise<Repository[]> {
    const lines = await this.readLines();
    if (lines === null) return [];

    const repos: Repository[] = [];
    for (const path of lines.slice(1)) {
      if (path.length === 0) continue;
      if (!(await pathExists(path))) continue;
      if (matchesIgnoredPath(path, ignoredPaths)) continue;
      repos.push(new Repository(path));
    }
    return repos;
  }

  /**
   * Delete the cache file, forcing a rescan on the next read.
   */
  async clear(): Promise<void> {
    await rm(this.cacheFile, { force: true });
  }

  /**
   * Milliseconds since the cache was last written, or null if there is no
   * cache file.
   */
  async getCacheAge(now: number = Date.now()): Promise<number | null> {
    try {
      const stats = await stat(this.cacheFile);
      return Math.max(0, now - stats.mtimeMs);
    } catch {
      return null;
    }
  }
}
