/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Application log level (defaults by environment when unset) */
  LOG_LEVEL: LogLevelSchema.optional(),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Log file path (optional) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // AI
  // ===================================================================

  /** Minimax search depth in plies */
  ATAXX_AI_DEPTH: z.coerce.number().int().min(1).max(8).default(4),

  /** Difficulty preset (1-10); overrides depth and randomness when set */
  ATAXX_AI_DIFFICULTY: z.coerce.number().int().min(1).max(10).optional(),

  /** Base seed for AI random policies */
  ATAXX_AI_SEED: z.coerce.number().int().min(0).default(0),

  /** Probability of a random legal move instead of the searched one */
  ATAXX_AI_RANDOMNESS: z.coerce.number().min(0).max(1).default(0),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          }))
        : [
            {
              path: '',
              message: result.error.message,
            },
          ];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * Called once at startup. If validation fails it prints the problems and
 * exits the process.
 */
export function loadEnvOrExit(
  env: Record<string, string | undefined> = process.env
): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
