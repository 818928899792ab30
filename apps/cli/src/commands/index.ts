import type { Command } from "commander";
import type { SubcommandName } from "@gitfleet/core";
import { createAheadCommand, runAhead } from "./ahead.js";
import { createIgnoreCommand, runIgnore } from "./ignore.js";
import { createIgnoredCommand, runIgnored } from "./ignored.js";
import { createInfoCommand, runInfo } from "./info.js";
import { createListCommand, runList } from "./list.js";
import type { SubcommandHandler } from "./run.js";
import { createScanCommand, runScan } from "./scan.js";
import { createStagedCommand, runStaged } from "./staged.js";
import { createStashedCommand, runStashed } from "./stashed.js";
import { createStatusCommand, runStatus } from "./status.js";
import { createUnstagedCommand, runUnstaged } from "./unstaged.js";

export interface SubcommandDefinition {
  create: () => Command;
  run: SubcommandHandler;
}

export const SUBCOMMANDS: Record<SubcommandName, SubcommandDefinition> = {
  status: { create: createStatusCommand, run: runStatus },
  list: { create: createListCommand, run: runList },
  scan: { create: createScanCommand, run: runScan },
  staged: { create: createStagedCommand, run: runStaged },
  unstaged: { create: createUnstagedCommand, run: runUnstaged },
  stashed: { create: createStashedCommand, run: runStashed },
  ahead: { create: createAheadCommand, run: runAhead },
  info: { create: createInfoCommand, run: runInfo },
  ignore: { create: createIgnoreCommand, run: runIgnore },
  ignored: { create: createIgnoredCommand, run: runIgnored },
};

export { runSubcommand, fail, type GlobalOptions } from "./run.js";
