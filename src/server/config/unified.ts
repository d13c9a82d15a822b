/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { AI_DIFFICULTY_PRESETS } from '../game/ai/AIPlayer';
import {
  getEffectiveNodeEnv,
  loadEnvOrExit,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
} from './env';

// Load .env into process.env before we read anything from it.
// Skipped in test mode so a developer's .env cannot change test behaviour.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const env = loadEnvOrExit();

const nodeEnv = getEffectiveNodeEnv(env);
const isTest = nodeEnv === 'test';

// Difficulty presets take precedence over the raw depth/randomness knobs.
const preset =
  env.ATAXX_AI_DIFFICULTY !== undefined ? AI_DIFFICULTY_PRESETS[env.ATAXX_AI_DIFFICULTY] : undefined;

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  version: z.string(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  ai: z.object({
    searchDepth: z.number().int().min(1),
    randomness: z.number().min(0).max(1),
    seed: z.number().int().min(0),
    difficulty: z.number().int().min(1).max(10).optional(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  version: env.npm_package_version ?? '0.0.0',
  logging: {
    level: env.LOG_LEVEL ?? (isTest ? 'error' : 'info'),
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  ai: {
    searchDepth: preset?.searchDepth ?? env.ATAXX_AI_DEPTH,
    randomness: preset?.randomness ?? env.ATAXX_AI_RANDOMNESS,
    seed: env.ATAXX_AI_SEED,
    difficulty: env.ATAXX_AI_DIFFICULTY,
  },
};

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
