import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  NETSETTLE_DATA_DIR: z.string().min(1).or(z.undefined()),
  NETSETTLE_DB_FILENAME: z.string().min(1).default('settlement.db'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Get the data directory path for the settlement database.
 *
 * Priority:
 * 1. NETSETTLE_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/data' (default)
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.NETSETTLE_DATA_DIR ?? path.join(process.cwd(), 'data');
}

/**
 * Full path of the SQLite database file.
 */
export function getDatabasePath(): string {
  return path.join(getDataDirectory(), validateEnv().NETSETTLE_DB_FILENAME);
}

/**
 * Drop the cached environment. Tests use this after changing process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
