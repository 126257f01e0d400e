/**
 * Bot configuration.
 *
 * `env.ts` validates the raw environment; `unified.ts` assembles the frozen
 * `config` object that the rest of the bot reads.
 */

export { config } from './unified';
export type { AppConfig } from './unified';

export { parseEnv, getEffectiveNodeEnv } from './env';
export type { RawEnv, EnvValidationResult, NodeEnv, LogLevel, LogFormat } from './env';
