// apps/cli/src/errors.ts

export class UnknownSubcommandError extends Error {
  constructor(public readonly subcommand: string) {
    super(`Unknown subcommand: ${subcommand}`);
    this.name = "UnknownSubcommandError";
  }
}

export class MissingArgumentError extends Error {
  constructor(
    public readonly subcommand: string,
    public readonly argument: string,
  ) {
    super(`The ${subcommand} subcommand needs a <${argument}> argument`);
    this.name = "MissingArgumentError";
  }
}

/**
 * The gitfleet settings in git's configuration are missing or malformed.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
