// packages/core/src/inventory/inventory.ts
import { CacheStore } from "../cache/cache-store.js";
import { IgnoreList } from "../cache/ignore-list.js";
import { resolveCacheFile, resolveIgnoreFile } from "../cache/paths.js";
import { Discoverer, type DiscoveryProgress } from "../discovery/discoverer.js";
import type { FleetConfig } from "../models/config.js";
import type { Repository } from "../models/repository.js";
import type { VcsProvider } from "../vcs/types.js";

export interface InventoryOptions {
  vcs: VcsProvider;
  /** Progress hooks, passed through to the discoverer on rescans */
  progress?: DiscoveryProgress;
}

/**
 * The set of repositories gitfleet operates on. Served from the cache while
 * it is valid for the current configuration; rebuilt by scanning otherwise.
 */
export class Inventory {
  readonly config: FleetConfig;
  private readonly vcs: VcsProvider;
  private readonly progress: DiscoveryProgress;
  private readonly cache: CacheStore;
  private readonly ignoreList: IgnoreList;

  constructor(config: FleetConfig, options: InventoryOptions) {
    this.config = config;
    this.vcs = options.vcs;
    this.progress = options.progress ?? {};
    this.cache = new CacheStore(resolveCacheFile(config));
    this.ignoreList = new IgnoreList(resolveIgnoreFile(config));
  }

  get cacheFile(): string {
    return this.cache.cacheFile;
  }

  get ignoreFile(): string {
    return this.ignoreList.ignoreFile;
  }

  /**
   * Known repositories, sorted by path. Scans and rewrites the cache first
   * when it is missing or was built under another configuration.
   */
  async getRepositories(): Promise<Repository[]> {
    const ignoredPaths = await this.ignoreList.load();

    if (!(await this.cache.isValid(this.config))) {
      const discoverer = new Discoverer(this.vcs, {
        ...this.progress,
        ignoredPaths,
      });
      const repos = await discoverer.findRepositories(this.config);
      await this.cache.write(this.config, repos);
    }

    return this.cache.read(ignoredPaths);
  }

  /** Force a rescan on the next `getRepositories` */
  async clearCache(): Promise<void> {
    await this.cache.clear();
  }

  /**
   * Add a repository to the ignore list. The cache is left as is; its entry
   * is filtered out on read and dropped by the next rescan.
   * @returns the canonical path that was stored
   */
  async ignoreRepository(path: string): Promise<string> {
    return this.ignoreList.add(path);
  }

  async getIgnoredRepositories(): Promise<string[]> {
    return this.ignoreList.load();
  }

  async getCacheAge(now?: number): Promise<number | null> {
    return this.cache.getCacheAge(now);
  }
}
