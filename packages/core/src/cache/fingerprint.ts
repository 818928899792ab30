// packages/core/src/cache/fingerprint.ts
import { createHash } from "crypto";
import type { FleetConfig } from "../models/config.js";

/**
 * Stable hash of every configuration field, as an unsigned 64-bit decimal
 * string. A cache written under one fingerprint is stale under any other.
 *
 * Only guaranteed stable within one release of gitfleet; a new release may
 * hash differently and rebuild existing caches.
 */
export function fingerprint(config: FleetConfig): string {
  // Fixed field order; optional paths serialise as null so that "unset" and
  // "set" never collide.
  const fields = [
    config.scanRoot,
    config.followSymlinks,
    config.sameFilesystem,
    config.ignorePatterns,
    config.defaultCmd,
    config.verbose,
    config.showUntracked,
    config.cacheFile ?? null,
    config.ignoreFile ?? null,
  ];
  const digest = createHash("sha256").update(JSON.stringify(fields)).digest();
  return digest.readBigUInt64BE(0).toString();
}

/**
 * Parse the first line of a cache file. Returns null unless it is a plain
 * unsigned decimal integer.
 */
export function parseFingerprint(line: string): bigint | null {
  const trimmed = line.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return BigInt(trimmed);
}
