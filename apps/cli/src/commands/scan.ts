import { Command } from "commander";
import { CLI_NAME } from "../constants.js";
import { Report } from "../output/report.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runScan: SubcommandHandler = async (context) => {
  await context.inventory.clearCache();
  const repos = await context.inventory.getRepositories();

  const report = new Report();
  report.addMessage(
    `Found ${repos.length} repos. Use \`${CLI_NAME} list\` to show them.`,
  );
  return report;
};

export function createScanCommand(): Command {
  return new Command("scan")
    .description("Rescan the base directory and update the repo cache")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runScan);
    });
}
