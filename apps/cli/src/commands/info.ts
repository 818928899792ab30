import { Command } from "commander";
import { CLI_NAME, VERSION } from "../constants.js";
import { Report } from "../output/report.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Render a duration as `Dd, Hh, Mm, Ss`, dropping any fraction of a second.
 */
export function formatAge(ms: number): string {
  let rest = Math.max(0, Math.floor(ms / SECOND) * SECOND);
  const days = Math.floor(rest / DAY);
  rest -= days * DAY;
  const hours = Math.floor(rest / HOUR);
  rest -= hours * HOUR;
  const minutes = Math.floor(rest / MINUTE);
  rest -= minutes * MINUTE;
  const seconds = Math.floor(rest / SECOND);
  return `${days}d, ${hours}h, ${minutes}m, ${seconds}s`;
}

export const runInfo: SubcommandHandler = async (context) => {
  const { config, inventory } = context;
  const repos = await inventory.getRepositories();
  const report = new Report();

  const title = `${CLI_NAME} ${VERSION}`;
  report.addMessage(title);
  report.addMessage("=".repeat(title.length));
  report.addMessage(`Number of repos: ${repos.length}`);
  report.addMessage(`Base directory: ${config.scanRoot}`);
  report.addMessage(`Cache file: ${inventory.cacheFile}`);
  const age = await inventory.getCacheAge();
  if (age !== null) {
    report.addMessage(`Cache file age: ${formatAge(age)}`);
  }
  report.addMessage(`Ignore file: ${inventory.ignoreFile}`);
  report.addMessage("Ignored patterns:");
  for (const pattern of config.ignorePatterns) {
    report.addMessage(`  ${pattern}`);
  }
  report.addMessage(`Default command: ${config.defaultCmd}`);
  report.addMessage(`Show untracked: ${config.showUntracked}`);
  return report;
};

export function createInfoCommand(): Command {
  return new Command("info")
    .description("Show meta-information about gitfleet")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runInfo);
    });
}
