/**
 * Shared Errors Module
 *
 * This module exports structured error types for consistent error handling
 * across the bot.
 *
 * @module errors
 */

export {
  // Error codes
  BotErrorCode,
  type ServiceErrorCategory,
  // Base class
  BotError,
  type BotErrorJSON,
  // Specific errors
  MalformedMoveError,
  MalformedEventError,
  ExternalServiceError,
  EngineUnavailableError,
  // Utilities
  isBotError,
  isFatalError,
  wrapError,
} from './BotDomainErrors';
