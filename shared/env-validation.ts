/**
 * Environment Variable Validation and Type Safety
 *
 * Validates and coerces the environment variables the matching service reads.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const ServerConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: LogLevelSchema.optional(),
  CORS_ORIGINS: z.string().default('*'),
});

export const MatchingConfigSchema = z.object({
  PROFILES_PATH: z.string().min(1).default('server/data/profiles.json'),
  DEFAULT_TOP_N: z.coerce.number().int().positive().default(5),
  MAX_TOP_N: z.coerce.number().int().positive().default(50),
});

export const EnvironmentSchema = ServerConfigSchema.merge(MatchingConfigSchema).refine(
  (env) => env.DEFAULT_TOP_N <= env.MAX_TOP_N,
  { message: 'DEFAULT_TOP_N must not exceed MAX_TOP_N', path: ['DEFAULT_TOP_N'] }
);

export type ValidatedEnvironment = z.infer<typeof EnvironmentSchema>;

/**
 * Parse an environment map, throwing one error that lists every issue
 */
export function validateEnvironment(env: Record<string, string | undefined>): ValidatedEnvironment {
  const result = EnvironmentSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.errors
      .map((err) => `${err.path.join('.') || 'env'}: ${err.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
