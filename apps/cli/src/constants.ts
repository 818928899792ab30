// apps/cli/src/constants.ts

export const CLI_NAME = "gitfleet";

/** Keep in step with package.json */
export const VERSION = "0.3.0";

/** Exit code for any reported error: bad configuration, unknown command or I/O failure */
export const EXIT_ERROR = 1;

/** Prefix of the gitfleet keys in git's configuration */
export const GIT_CONFIG_SECTION = "global";
