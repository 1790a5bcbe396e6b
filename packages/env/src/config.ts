import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  TRUSTLEDGER_DATA_DIR: z.string().min(1).or(z.undefined()),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
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
 * Drop the cached environment so the next access re-reads process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Get the root directory of the sponsor reference datasets
 * (`<root>/[<tax_year>/]gross-proceeds-<symbol>.csv`).
 *
 * Priority:
 * 1. TRUSTLEDGER_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/gross_proceeds' (default)
 *
 * @returns Absolute path to the reference data directory
 */
export function getReferenceDataDirectory(): string {
  const env = validateEnv();
  return path.resolve(env.TRUSTLEDGER_DATA_DIR ?? path.join(process.cwd(), 'gross_proceeds'));
}

/**
 * Get the current NODE_ENV value.
 */
export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

/**
 * Check if running in development environment.
 */
export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}
