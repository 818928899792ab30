import { z } from "zod";

export const SUBCOMMAND_NAMES = [
  "status",
  "list",
  "scan",
  "staged",
  "unstaged",
  "stashed",
  "ahead",
  "info",
  "ignore",
  "ignored",
] as const;

export type SubcommandName = (typeof SUBCOMMAND_NAMES)[number];

// Everything a gitfleet invocation runs with. Two configs with equal fields
// produce the same fingerprint, and so share a cache file.
export const FleetConfigSchema = z.object({
  /** Directory the repository scan starts from */
  scanRoot: z.string().min(1),
  /** Descend into symlinked directories while scanning */
  followSymlinks: z.boolean().default(true),
  /** Never cross onto another filesystem than the scan root's */
  sameFilesystem: z.boolean().default(process.platform !== "win32"),
  /** Substrings; any path containing one is skipped while scanning */
  ignorePatterns: z.array(z.string()).default([]),
  /** Subcommand run when none is given on the command line */
  defaultCmd: z.enum(SUBCOMMAND_NAMES).default("status"),
  verbose: z.boolean().default(false),
  /** Include untracked files in status output */
  showUntracked: z.boolean().default(true),
  cacheFile: z.string().min(1).optional(),
  ignoreFile: z.string().min(1).optional(),
});

export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type FleetConfigInput = z.input<typeof FleetConfigSchema>;

export function defineConfig(config: FleetConfigInput): FleetConfig {
  return FleetConfigSchema.parse(config);
}
