import { Command } from "commander";
import { stashOperation } from "@gitfleet/core";
import { Report } from "../output/report.js";
import { queryRepositories } from "./query.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runStashed: SubcommandHandler = async (context) => {
  const repos = await context.inventory.getRepositories();
  const report = new Report(repos).padRepoOutput();

  const results = await queryRepositories(context, repos, stashOperation(context.vcs));
  for (const [path, entries] of results) {
    for (const entry of entries) {
      report.addRepoMessage(path, entry);
    }
  }
  return report;
};

export function createStashedCommand(): Command {
  return new Command("stashed")
    .description("Show stashes for all repos")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runStashed);
    });
}
