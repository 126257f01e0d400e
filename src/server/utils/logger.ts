import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Session context stored in AsyncLocalStorage so that every line logged while
 * a game is being played carries its id.
 */
export interface SessionContext {
  gameId: string;
}

// ============================================================================
// Session Context (AsyncLocalStorage)
// ============================================================================

export const sessionContextStorage = new AsyncLocalStorage<SessionContext>();

/**
 * Get the current session context from AsyncLocalStorage.
 * Returns undefined if called outside of a session.
 */
export const getSessionContext = (): SessionContext | undefined => {
  return sessionContextStorage.getStore();
};

/**
 * Run a function within a session context. All logs and async operations
 * within the callback will have access to the context.
 */
export const runWithSessionContext = <T>(context: SessionContext, fn: () => T): T => {
  return sessionContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects.
 * These are matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /authorization/i,
  /bearer/i,
  /credential/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Redact a sensitive string value.
 * Shows first 4 characters for debugging while hiding the rest.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!isSensitiveKey(key)) {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else if (value === null || value === undefined) {
      result[key] = value;
    } else if (typeof value === 'string') {
      result[key] = redactSensitiveString(value);
    } else if (typeof value === 'object') {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    } else {
      result[key] = '[REDACTED]';
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'relay-bot';

/** Fields winston itself owns; never passed through masking. */
const UNMASKED_KEYS = new Set(['level', 'message', 'timestamp']);

/** Default metadata that would only repeat itself on every console line. */
const CONSOLE_OMITTED_KEYS = new Set(['service', 'environment']);

/**
 * Custom format to add the session context from AsyncLocalStorage.
 */
const addSessionContext = winston.format((info) => {
  const context = getSessionContext();
  if (context && info.gameId === undefined) {
    info.gameId = context.gameId;
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  // Handle Error objects specially
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  // Mask any sensitive data in the log entry. Assign in place so winston's
  // symbol-keyed fields survive for later formats.
  const rest = Object.fromEntries(
    Object.entries(info).filter(([key]) => !UNMASKED_KEYS.has(key))
  );
  Object.assign(info, maskSensitiveData(rest));
  return info;
});

/**
 * Format for structured JSON logging (used in production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addSessionContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (used in development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addSessionContext(),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const extra = Object.fromEntries(
      Object.entries(meta).filter(([key]) => !CONSOLE_OMITTED_KEYS.has(key))
    );
    const metaStr = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      // Keep test output readable; tests assert on mocked loggers instead.
      silent: config.isTest,
    }),
  ],
});

const configuredLogFile = config.logging.file;
if (configuredLogFile) {
  const logPath = path.resolve(configuredLogFile);
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  // File transport always uses JSON format
  logger.add(
    new winston.transports.File({
      filename: logPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export { logger };
