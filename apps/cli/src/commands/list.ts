import { Command } from "commander";
import { Report } from "../output/report.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runList: SubcommandHandler = async (context) => {
  const repos = await context.inventory.getRepositories();
  const report = new Report();
  for (const repo of repos) {
    report.addMessage(repo.path);
  }
  return report;
};

export function createListCommand(): Command {
  return new Command("list")
    .description("List all known repos")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runList);
    });
}
