import { Command } from "commander";
import { statusReport } from "./status.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runStaged: SubcommandHandler = (context) => statusReport(context, "index");

export function createStagedCommand(): Command {
  return new Command("staged")
    .description("Show git index status for all repos")
    .action(async (_options, command: Command) => {
      await runSubcommand(command, runStaged);
    });
}
