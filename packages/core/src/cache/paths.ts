import { homedir } from "os";
import { dirname, join } from "path";
import type { FleetConfig } from "../models/config.js";

const APP_DIR = "gitfleet";

export const DEFAULT_CACHE_FILENAME = "repos.txt";
export const DEFAULT_IGNORE_FILENAME = "ignored.txt";

/**
 * The per-user cache directory for gitfleet, following each platform's
 * convention.
 */
export function defaultCacheDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): string {
  if (env.XDG_CACHE_HOME) {
    return join(env.XDG_CACHE_HOME, APP_DIR);
  }
  switch (platform) {
    case "darwin":
      return join(homedir(), "Library", "Caches", APP_DIR);
    case "win32":
      return join(env.LOCALAPPDATA ?? join(homedir(), "AppData", "Local"), APP_DIR, "cache");
    default:
      return join(homedir(), ".cache", APP_DIR);
  }
}

export function resolveCacheFile(config: FleetConfig): string {
  return config.cacheFile ?? join(defaultCacheDir(), DEFAULT_CACHE_FILENAME);
}

/**
 * The ignore list lives beside the cache file unless configured otherwise.
 */
export function resolveIgnoreFile(config: FleetConfig): string {
  return (
    config.ignoreFile ??
    join(dirname(resolveCacheFile(config)), DEFAULT_IGNORE_FILENAME)
  );
}
