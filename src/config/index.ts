/**
 * Configuration Management
 *
 * Reads FLEETVAULT_* variables from the environment (a local .env file is
 * loaded first by dotenv) and validates them.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '~/types';

export interface FleetVaultConfig {
  /** SQLite file path, or ':memory:' */
  databasePath: string;
  /** Persisted 32-byte field-encryption secret */
  secretPath: string;
  owner: {
    username: string;
    password: string;
  };
  bcryptRounds: number;
  bruteForceWindowMinutes: number;
  log: {
    level: 'debug' | 'info' | 'warn' | 'error';
    format: 'json' | 'pretty';
  };
}

const envSchema = z.object({
  FLEETVAULT_DB_PATH: z.string().min(1).default('data/fleetvault.db'),
  FLEETVAULT_SECRET_PATH: z.string().min(1).default('data/fleetvault.key'),
  FLEETVAULT_OWNER_USERNAME: z.string().min(1).default('super_admin'),
  FLEETVAULT_OWNER_PASSWORD: z.string().min(1).default('Admin_123?'),
  FLEETVAULT_BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  FLEETVAULT_BRUTE_FORCE_WINDOW_MINUTES: z.coerce.number().int().positive().default(10),
  FLEETVAULT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  FLEETVAULT_LOG_FORMAT: z.enum(['json', 'pretty']).default('json')
});

/**
 * Build the configuration from an environment map.
 *
 * @param env - Defaults to process.env after loading .env
 * @throws {ConfigurationError} If a variable is present but malformed
 */
export function loadConfig(env?: NodeJS.ProcessEnv): FleetVaultConfig {
  if (!env) {
    dotenv.config();
  }

  const parsed = envSchema.safeParse(env ?? process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    databasePath: vars.FLEETVAULT_DB_PATH,
    secretPath: vars.FLEETVAULT_SECRET_PATH,
    owner: {
      username: vars.FLEETVAULT_OWNER_USERNAME.toLowerCase(),
      password: vars.FLEETVAULT_OWNER_PASSWORD
    },
    bcryptRounds: vars.FLEETVAULT_BCRYPT_ROUNDS,
    bruteForceWindowMinutes: vars.FLEETVAULT_BRUTE_FORCE_WINDOW_MINUTES,
    log: {
      level: vars.FLEETVAULT_LOG_LEVEL,
      format: vars.FLEETVAULT_LOG_FORMAT
    }
  };
}
