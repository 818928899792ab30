import { Command } from "commander";
import { statusReport } from "./status.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runUnstaged: SubcommandHandler = (context) => statusReport(context, "workdir");

export function createUnstagedCommand(): Command {
  return new Command("unstaged")
    .description("Show working directory status for all repos")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runUnstaged);
    });
}
