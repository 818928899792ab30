import { Command } from "commander";
import { CLI_NAME } from "../constants.js";
import { MissingArgumentError } from "../errors.js";
import { Report } from "../output/report.js";
import { runSubcommand, type SubcommandHandler } from "./run.js";

export const runIgnore: SubcommandHandler = async (context, args) => {
  const [path] = args;
  if (path === undefined) {
    throw new MissingArgumentError("ignore", "path");
  }

  const stored = await context.inventory.ignoreRepository(path);
  const report = new Report();
  report.addMessage(
    `Added ${stored} to the ignore list. Run \`${CLI_NAME} scan\` to update the cache.`,
  );
  return report;
};

export function createIgnoreCommand(): Command {
  return new Command("ignore")
    .description("Stop tracking a repo; it is skipped by every later command")
    .argument("<path>", "Path of the repository to ignore")
    .action(async (path: string, _options, command: Command) => {
      await runSubcommand(command, runIgnore, [path]);
    });
}
