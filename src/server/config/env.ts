/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 *
 * All environment variables should be defined here with appropriate
 * validation rules and defaults.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/** Probability in [0, 1]. */
const ChanceSchema = z.coerce.number().min(0).max(1);

/** Comma-separated, trimmed, lower-cased, non-empty keyword list. */
const KeywordListSchema = z
  .string()
  .transform((val) =>
    val
      .split(',')
      .map((word) => word.trim().toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.string()).nonempty('at least one keyword is required'));

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category for clarity:
 * - Environment
 * - Game Service
 * - Engine
 * - Bot Behaviour
 * - Logging
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
  // GAME SERVICE
  // ===================================================================

  /** Personal API token with board:play and challenge:write scopes */
  LICHESS_API_TOKEN: z.string().optional(),

  /** Base URL of the game service */
  LICHESS_API_URL: z.string().url().default('https://lichess.org'),

  /** Per-request timeout for action calls (milliseconds) */
  LICHESS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // ===================================================================
  // ENGINE
  // ===================================================================

  /** Executable of the UCI move-search engine */
  ENGINE_PATH: z.string().min(1).default('stockfish'),

  /** Search time per move (milliseconds) */
  ENGINE_MOVE_TIME_MS: z.coerce.number().int().positive().default(2000),

  /** Upper bound for the UCI handshake (milliseconds) */
  ENGINE_STARTUP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  // ===================================================================
  // BOT BEHAVIOUR
  // ===================================================================

  /** Probability of accepting a draw offer once the move gate is passed */
  BOT_DRAW_ACCEPT_CHANCE: ChanceSchema.default(0.3),

  /** Probability of accepting a takeback offer */
  BOT_TAKEBACK_ACCEPT_CHANCE: ChanceSchema.default(0.2),

  /** Probability of resigning when the position qualifies */
  BOT_RESIGN_CHANCE: ChanceSchema.default(0.1),

  /** Minimum ply count before any draw offer can be accepted */
  BOT_MIN_MOVES_FOR_DRAW: z.coerce.number().int().min(0).default(10),

  /** Pause before computing and submitting a move (milliseconds) */
  BOT_MOVE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  /** Chat keywords read as a draw proposal */
  BOT_DRAW_KEYWORDS: KeywordListSchema.default('draw,ничья,peace'),

  /** Chat keywords read as a takeback proposal */
  BOT_TAKEBACK_KEYWORDS: KeywordListSchema.default('takeback,отмена,back,undo'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Application log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Log file path (optional) */
  LOG_FILE: z.string().optional(),
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
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validation result with data or errors
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
 * This function should be called once at startup. If validation fails,
 * it prints clear error messages and exits the process.
 *
 * @param env - Environment object to parse (defaults to process.env)
 * @returns Validated environment object
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('❌ Invalid environment configuration:');
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
 * regardless of NODE_ENV to ensure test-specific behavior.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

