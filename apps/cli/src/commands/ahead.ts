import { Command } from "commander";
import { aheadOperation } from "@gitfleet/core";
import { Report } from "../output/report.js";
import { queryRepositories } from "./query.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runAhead: SubcommandHandler = async (context) => {
  const repos = await context.inventory.getRepositories();
  const report = new Report(repos);

  const results = await queryRepositories(context, repos, aheadOperation(context.vcs));
  for (const [path, ahead] of results) {
    // Marks the repository with no lines under it
    if (ahead) report.addRepoMessage(path, "");
  }
  return report;
};

export function createAheadCommand(): Command {
  return new Command("ahead")
    .description("Show repos where a local branch is ahead of its remotes")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runAhead);
    });
}
