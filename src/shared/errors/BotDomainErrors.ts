/**
 * Bot Domain Errors - Structured error types for the relay bot
 *
 * This module provides consistent error types for every layer that touches a
 * live game (event codec, position tracker, game service client, engine
 * adapter, session controller).
 *
 * Error Categories:
 * - **Move Errors**: a move token cannot be replayed against the position
 * - **Event Errors**: a streamed event is not JSON or lacks required fields
 * - **Service Errors**: any failure calling the remote game service
 * - **Engine Errors**: the move-search engine crashed, exited or timed out
 *
 * Usage:
 * ```typescript
 * import { MalformedMoveError, isFatalError } from './BotDomainErrors';
 *
 * throw new MalformedMoveError('e2e5', 0);
 *
 * if (isFatalError(error)) {
 *   // end the session
 * }
 * ```
 *
 * @module BotDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum BotErrorCode {
  // Move Errors
  MOVE_MALFORMED = 'MOVE_MALFORMED',

  // Event Errors
  EVENT_MALFORMED = 'EVENT_MALFORMED',

  // Game Service Errors
  SERVICE_REQUEST_FAILED = 'SERVICE_REQUEST_FAILED',

  // Engine Errors
  ENGINE_UNAVAILABLE = 'ENGINE_UNAVAILABLE',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Coarse classification of a game-service failure, derived from the
 * transport error code or the HTTP status.
 */
export type ServiceErrorCategory =
  | 'connection_refused'
  | 'timeout'
  | 'client_error'
  | 'server_error'
  | 'unknown';

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all bot domain errors.
 *
 * Provides:
 * - Structured error code
 * - Context for debugging
 * - Whether the error should end the current session
 * - Serialization for structured logs
 */
export class BotError extends Error {
  /** Error code for programmatic handling */
  readonly code: BotErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (the session should end) */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: BotErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'BotError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, BotError.prototype);
  }

  /** Serialize to a JSON-safe object for structured logs */
  toJSON(): BotErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of a BotError.
 */
export interface BotErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A move token is not a legal continuation of the position built from the
 * tokens before it.
 */
export class MalformedMoveError extends BotError {
  readonly token: string;
  readonly ply: number;

  constructor(token: string, ply: number, context: Record<string, unknown> = {}) {
    super(
      BotErrorCode.MOVE_MALFORMED,
      `Move "${token}" at ply ${ply} cannot be replayed`,
      { token, ply, ...context },
      true
    );
    this.name = 'MalformedMoveError';
    this.token = token;
    this.ply = ply;
    Object.setPrototypeOf(this, MalformedMoveError.prototype);
  }
}

/**
 * A streamed line could not be decoded into a known event shape.
 */
export class MalformedEventError extends BotError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(BotErrorCode.EVENT_MALFORMED, `Malformed event: ${reason}`, { reason, ...context }, true);
    this.name = 'MalformedEventError';
    Object.setPrototypeOf(this, MalformedEventError.prototype);
  }
}

/**
 * Any failure calling the remote game service.
 */
export class ExternalServiceError extends BotError {
  readonly operation: string;
  readonly category: ServiceErrorCategory;
  readonly status: number | undefined;

  constructor(
    operation: string,
    reason: string,
    category: ServiceErrorCategory,
    status?: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      BotErrorCode.SERVICE_REQUEST_FAILED,
      `Game service ${operation} failed: ${reason}`,
      { operation, category, status, ...context },
      false
    );
    this.name = 'ExternalServiceError';
    this.operation = operation;
    this.category = category;
    this.status = status;
    Object.setPrototypeOf(this, ExternalServiceError.prototype);
  }
}

/**
 * The move-search engine failed, exited or did not answer in time.
 */
export class EngineUnavailableError extends BotError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(
      BotErrorCode.ENGINE_UNAVAILABLE,
      `Engine unavailable: ${reason}`,
      { reason, ...context },
      true
    );
    this.name = 'EngineUnavailableError';
    Object.setPrototypeOf(this, EngineUnavailableError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Check if an error is a BotError.
 */
export function isBotError(error: unknown): error is BotError {
  return error instanceof BotError;
}

/**
 * Check if an error is fatal.
 */
export function isFatalError(error: unknown): boolean {
  return isBotError(error) && error.isFatal;
}

/**
 * Wrap an unknown error in a BotError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): BotError {
  if (isBotError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new BotError(BotErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
