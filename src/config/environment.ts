/**
 * Environment settings
 *
 * Synchronous, zod-validated view of the process environment. The random
 * source asks it whether a secret key is configured; the module-level token
 * functions take their defaults from it.
 */

import { z } from 'zod';
import { SECRET_KEY_ENV } from '../core/types.js';

const BooleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', '']))
  .transform((value) => (value === '' ? undefined : value === 'true' || value === '1' || value === 'yes'));

const OptionalSecretSchema = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

export const EnvironmentSchema = z.object({
  [SECRET_KEY_ENV]: OptionalSecretSchema,
  SESSION_SIGN_SESSIONS: BooleanFlagSchema.optional(),
  SESSION_AUDIT: BooleanFlagSchema.optional(),
  SESSION_CONFIG_PATH: z.string().trim().min(1).optional(),
});

export interface EnvironmentSettings {
  secretKey?: string;
  /** Undefined when the variable is not set, so callers can layer defaults */
  signSessions?: boolean;
  audit?: boolean;
  configPath?: string;
}

/**
 * Read session settings from environment variables.
 *
 * @throws ZodError if a flag holds something other than true/false/1/0/yes/no
 */
export function readEnvironmentSettings(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  return toSettings(EnvironmentSchema.parse(env));
}

/**
 * Like readEnvironmentSettings, but a variable that fails validation is
 * treated as unset and reported with console.warn.
 */
export function readEnvironmentSettingsOrDefaults(
  env: NodeJS.ProcessEnv = process.env
): EnvironmentSettings {
  const result = EnvironmentSchema.safeParse(env);
  if (result.success) {
    return toSettings(result.data);
  }

  const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
  for (const name of invalid) {
    console.warn(`[Environment] Ignoring invalid value for ${name}`);
  }
  const remaining = Object.fromEntries(Object.entries(env).filter(([name]) => !invalid.has(name)));
  return toSettings(EnvironmentSchema.parse(remaining));
}

function toSettings(parsed: z.infer<typeof EnvironmentSchema>): EnvironmentSettings {
  return {
    secretKey: parsed[SECRET_KEY_ENV],
    signSessions: parsed.SESSION_SIGN_SESSIONS,
    audit: parsed.SESSION_AUDIT,
    configPath: parsed.SESSION_CONFIG_PATH,
  };
}

export function isSecretKeyConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return OptionalSecretSchema.parse(env[SECRET_KEY_ENV]) !== undefined;
}
