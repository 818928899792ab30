import { Command } from "commander";
import { Report } from "../output/report.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runIgnored: SubcommandHandler = async (context) => {
  const ignored = await context.inventory.getIgnoredRepositories();
  const report = new Report();

  if (ignored.length === 0) {
    report.addMessage("No repos are currently ignored.");
    return report;
  }

  report.addMessage(`Ignored repos (${ignored.length}):`);
  for (const path of ignored) {
    report.addMessage(`  ${path}`);
  }
  return report;
};

export function createIgnoredCommand(): Command {
  return new Command("ignored")
    .description("List the repos on the ignore list")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runIgnored);
    });
}
