/**
 * Unified Application Configuration
 *
 * This module is the canonical source of truth for all bot configuration.
 * It parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { readEnv } from '../../shared/utils/envFlags';
import { NodeEnvSchema, LogLevelSchema, LogFormatSchema, loadEnvOrExit, getEffectiveNodeEnv } from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env never leaks into test runs.
if (readEnv('NODE_ENV') !== 'test') {
  dotenv.config();
}

const env = loadEnvOrExit();

// Under Jest the effective environment is always "test", even when a .env
// file sets NODE_ENV=development.
const nodeEnv = getEffectiveNodeEnv(env);
const isTest = nodeEnv === 'test';

// The token is the bot's identity on the game service. Tests never reach the
// network, so they run with a placeholder.
let token = env.LICHESS_API_TOKEN?.trim() || undefined;
if (!token && isTest) {
  token = 'test-token';
}
if (!token) {
  throw new Error(
    'LICHESS_API_TOKEN is required. Create a personal token with the board:play and challenge:write scopes.'
  );
}

const appVersion = env.npm_package_version?.trim() || '1.0.0';

/**
 * Application configuration schema with comprehensive validation.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  gameService: z.object({
    url: z.string().url(),
    token: z.string().min(1),
    requestTimeoutMs: z.number().int().positive(),
  }),
  engine: z.object({
    path: z.string().min(1),
    moveTimeMs: z.number().int().positive(),
    startupTimeoutMs: z.number().int().positive(),
  }),
  policy: z.object({
    drawAcceptChance: z.number().min(0).max(1),
    takebackAcceptChance: z.number().min(0).max(1),
    resignChance: z.number().min(0).max(1),
    minMovesForDraw: z.number().int().min(0),
    moveDelayMs: z.number().int().min(0),
    drawKeywords: z.array(z.string().min(1)).nonempty(),
    takebackKeywords: z.array(z.string().min(1)).nonempty(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
});

const preliminaryConfig = {
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isTest,
  app: {
    version: appVersion,
  },
  gameService: {
    url: env.LICHESS_API_URL.replace(/\/+$/, ''),
    token,
    requestTimeoutMs: env.LICHESS_REQUEST_TIMEOUT_MS,
  },
  engine: {
    path: env.ENGINE_PATH,
    moveTimeMs: env.ENGINE_MOVE_TIME_MS,
    startupTimeoutMs: env.ENGINE_STARTUP_TIMEOUT_MS,
  },
  policy: {
    drawAcceptChance: env.BOT_DRAW_ACCEPT_CHANCE,
    takebackAcceptChance: env.BOT_TAKEBACK_ACCEPT_CHANCE,
    resignChance: env.BOT_RESIGN_CHANCE,
    minMovesForDraw: env.BOT_MIN_MOVES_FOR_DRAW,
    moveDelayMs: env.BOT_MOVE_DELAY_MS,
    drawKeywords: env.BOT_DRAW_KEYWORDS,
    takebackKeywords: env.BOT_TAKEBACK_KEYWORDS,
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
};

export type AppConfig = z.infer<typeof ConfigSchema>;

const parsed: AppConfig = ConfigSchema.parse(preliminaryConfig);

// The policy section is handed to every session controller; freeze it too.
export const config: Readonly<AppConfig> = Object.freeze({
  ...parsed,
  policy: Object.freeze(parsed.policy),
});
