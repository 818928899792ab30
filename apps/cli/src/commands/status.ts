import { Command } from "commander";
import { statusOperation, type StatusScope } from "@gitfleet/core";
import { Report } from "../output/report.js";
import { queryRepositories } from "./query.js";
import { runSubcommand, type CommandContext, type SubcommandHandler } from "./run.js";

/**
 * Short-format status lines for every repository with changes on the given
 * side, one padded block per repository.
 */
export async function statusReport(
  context: CommandContext,
  scope: StatusScope,
): Promise<Report> {
  const repos = await context.inventory.getRepositories();
  const report = new Report(repos).padRepoOutput();

  const query = statusOperation(context.vcs, scope, context.config.showUntracked);
  for (const [path, lines] of await queryRepositories(context, repos, query)) {
    for (const line of lines) {
      report.addRepoMessage(path, line);
    }
  }
  return report;
}

export const runStatus: SubcommandHandler = (context) => statusReport(context, "both");

export function createStatusCommand(): Command {
  return new Command("status")
    .description("Show git status for all repos")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runStatus);
    });
}
