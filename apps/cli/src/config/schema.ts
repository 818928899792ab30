import { z } from 'zod';
import { SUBCOMMAND_NAMES } from '@gitfleet/core';

// Spellings git itself accepts for boolean settings
const GIT_BOOLEANS: Record<string, boolean> = {
  true: true,
  yes: true,
  on: true,
  '1': true,
  false: false,
  no: false,
  off: false,
  '0': false,
};

export const GitBooleanSchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value, ctx) => {
    const parsed = GIT_BOOLEANS[value];
    if (parsed === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected true/false, yes/no, on/off or 1/0, received "${value}"`,
      });
      return z.NEVER;
    }
    return parsed;
  });

// Comma separated, blanks dropped
export const CommaListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const PathSettingSchema = z.string().trim().min(1);

/**
 * The `[global]` section of git's configuration, as gitfleet reads it.
 * Keys are the git config names with the section prefix removed.
 */
export const GitSettingsSchema = z.object({
  basedir: PathSettingSchema.optional(),
  'follow-symlinks': GitBooleanSchema.optional(),
  'same-filesystem': GitBooleanSchema.optional(),
  ignore: CommaListSchema.optional(),
  'default-cmd': z.enum(SUBCOMMAND_NAMES).optional(),
  verbose: GitBooleanSchema.optional(),
  'show-untracked': GitBooleanSchema.optional(),
  'cache-file': PathSettingSchema.optional(),
  'ignore-file': PathSettingSchema.optional(),
});

export type GitSettings = z.infer<typeof GitSettingsSchema>;
