import { Command, Option } from "commander";
import { SUBCOMMAND_NAMES } from "@gitfleet/core";
import { SUBCOMMANDS, fail, runSubcommand, type GlobalOptions } from "./commands/index.js";
import { CLI_NAME, VERSION } from "./constants.js";
import { UnknownSubcommandError } from "./errors.js";

export function createCli(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Keep track of all the git repositories on your machine")
    .version(VERSION)
    .option("--json", "Output results as JSON")
    .option("-v, --verbose", "Show scan progress and repos that could not be queried")
    .addOption(
      new Option("--untracked", "Show untracked files in status output").conflicts(
        "nountracked",
      ),
    )
    .addOption(
      new Option("--nountracked", "Hide untracked files in status output").conflicts(
        "untracked",
      ),
    )
    .argument("[subcommand]", "Subcommand to run (default from git config, else status)")
    .action(async (subcommand: string | undefined, _options, command: Command) => {
      // Only reached when the word matched no registered subcommand
      if (subcommand !== undefined) {
        const json = command.optsWithGlobals<GlobalOptions>().json === true;
        fail(new UnknownSubcommandError(subcommand), json);
      }
      await runSubcommand(command, (context, args) =>
        SUBCOMMANDS[context.config.defaultCmd].run(context, args),
      );
    });

  for (const name of SUBCOMMAND_NAMES) {
    program.addCommand(SUBCOMMANDS[name].create());
  }

  return program;
}

export { Report, type ReportJson } from "./output/report.js";
export { loadConfig, buildConfig, type CliOverrides } from "./config/loader.js";
