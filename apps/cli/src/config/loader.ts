import { homedir } from 'os';
import { join } from 'path';
import { simpleGit, GitConfigScope, type SimpleGit } from 'simple-git';
import { fromZodError } from 'zod-validation-error';
import { FleetConfigSchema, type FleetConfig } from '@gitfleet/core';
import { GIT_CONFIG_SECTION } from '../constants.js';
import { ConfigError } from '../errors.js';
import { GitSettingsSchema, type GitSettings } from './schema.js';

/** Flags that override the stored settings for one invocation */
export interface CliOverrides {
  verbose?: boolean;
  untracked?: boolean;
  nountracked?: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// git exits non-zero when there is no global config file at all
function isMissingConfigFile(error: unknown): boolean {
  const message = errorMessage(error);
  return (
    message.includes('unable to read config file') ||
    message.includes('No such file or directory')
  );
}

/**
 * Raw `global.*` entries from the user's global git configuration, keyed
 * without the section prefix. Repeated keys keep their last value.
 */
export async function readGitSettings(
  git: SimpleGit = simpleGit(),
): Promise<Record<string, string>> {
  let values: Record<string, string | string[]>;
  try {
    const summary = await git.listConfig(GitConfigScope.global);
    values = summary.all;
  } catch (error) {
    if (isMissingConfigFile(error)) return {};
    throw new ConfigError(
      `Could not read git configuration: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const prefix = `${GIT_CONFIG_SECTION}.`;
  const settings: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!key.startsWith(prefix)) continue;
    const last = Array.isArray(value) ? value[value.length - 1] : value;
    if (last !== undefined) {
      settings[key.slice(prefix.length)] = last;
    }
  }
  return settings;
}

export function parseGitSettings(raw: Record<string, string>): GitSettings {
  const result = GitSettingsSchema.safeParse(raw);
  if (!result.success) {
    const validationError = fromZodError(result.error, {
      prefix: `Invalid [${GIT_CONFIG_SECTION}] settings in git config`,
      prefixSeparator: ': ',
    });
    throw new ConfigError(validationError.message, { cause: result.error });
  }
  return result.data;
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/**
 * Combine stored settings and command line flags into a configuration.
 * Anything left unset takes the configuration defaults.
 */
export function buildConfig(
  settings: GitSettings,
  overrides: CliOverrides = {},
  home: string = homedir(),
): FleetConfig {
  let showUntracked = settings['show-untracked'];
  if (overrides.untracked) showUntracked = true;
  if (overrides.nountracked) showUntracked = false;

  const cacheFile = settings['cache-file'];
  const ignoreFile = settings['ignore-file'];

  const result = FleetConfigSchema.safeParse({
    scanRoot: expandHome(settings.basedir ?? home, home),
    followSymlinks: settings['follow-symlinks'],
    sameFilesystem: settings['same-filesystem'],
    ignorePatterns: settings.ignore,
    defaultCmd: settings['default-cmd'],
    verbose: overrides.verbose || settings.verbose,
    showUntracked,
    cacheFile: cacheFile === undefined ? undefined : expandHome(cacheFile, home),
    ignoreFile: ignoreFile === undefined ? undefined : expandHome(ignoreFile, home),
  });
  if (!result.success) {
    throw new ConfigError(
      fromZodError(result.error, { prefix: 'Invalid configuration' }).message,
      { cause: result.error },
    );
  }
  return result.data;
}

export async function loadConfig(
  overrides: CliOverrides = {},
  git?: SimpleGit,
): Promise<FleetConfig> {
  const raw = await readGitSettings(git);
  return buildConfig(parseGitSettings(raw), overrides);
}
