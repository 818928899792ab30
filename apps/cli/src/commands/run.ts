import type { Command } from "commander";
import {
  GitVcsProvider,
  Inventory,
  type FleetConfig,
  type VcsProvider,
} from "@gitfleet/core";
import { loadConfig } from "../config/loader.js";
import { EXIT_ERROR } from "../constants.js";
import { error, setJsonMode } from "../output/reporters.js";
import type { Report } from "../output/report.js";
import { createScanProgress } from "../output/scan-progress.js";

/** Options every subcommand accepts */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  untracked?: boolean;
  nountracked?: boolean;
}

export interface CommandContext {
  config: FleetConfig;
  inventory: Inventory;
  vcs: VcsProvider;
  json: boolean;
}

export type SubcommandHandler = (
  context: CommandContext,
  args: readonly string[],
) => Promise<Report>;

export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({
    verbose: options.verbose,
    untracked: options.untracked,
    nountracked: options.nountracked,
  });
  const vcs = new GitVcsProvider();
  const inventory = new Inventory(config, {
    vcs,
    progress: createScanProgress(config.verbose),
  });
  return { config, inventory, vcs, json: options.json === true };
}

/**
 * Print an error the way the output mode asks for: a JSON document on
 * stderr, or a plain message.
 */
export function reportError(err: unknown, json: boolean): void {
  const message = err instanceof Error ? err.message : String(err);
  if (json) {
    console.error(JSON.stringify({ error: true, message }, null, 2));
  } else {
    error(message);
  }
}

export function fail(err: unknown, json: boolean): never {
  reportError(err, json);
  process.exit(EXIT_ERROR);
}

/**
 * Run a subcommand handler with the options of the command that invoked it,
 * print its report, and exit non-zero on any error.
 */
export async function runSubcommand(
  command: Command,
  handler: SubcommandHandler,
  args: readonly string[] = [],
): Promise<void> {
  const options = command.optsWithGlobals<GlobalOptions>();
  const json = options.json === true;
  setJsonMode(json);

  try {
    const context = await createContext(options);
    const report = await handler(context, args);
    report.print(json);
  } catch (err) {
    fail(err, json);
  }
}
