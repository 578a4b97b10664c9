/**
 * Game Domain Errors - Structured error types for the session layer
 *
 * Engine-level rule rejections are returned as values (see
 * src/shared/engine/types.ts). The errors here are for the layers around
 * the engine: payloads that are not moves at all, and invalid configuration.
 *
 * Usage:
 * ```typescript
 * import { InvalidMovePayloadError } from './GameDomainErrors';
 *
 * throw new InvalidMovePayloadError('from.file: Expected number', { payload });
 * ```
 *
 * @module GameDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

export enum GameErrorCode {
  // Move Errors
  MOVE_INVALID_PAYLOAD = 'MOVE_INVALID_PAYLOAD',

  // Startup Errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class GameError extends Error {
  /** Error code for programmatic handling */
  readonly code: GameErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  readonly timestamp: Date;

  constructor(code: GameErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, GameError.prototype);
  }

  /** Serialize to a JSON-safe object */
  toJSON(): GameErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface GameErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A submitted payload could not be read as a move. This is the session's
 * counterpart of a notation parse failure: the input never reached the rules.
 */
export class InvalidMovePayloadError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.MOVE_INVALID_PAYLOAD, message, context);
    this.name = 'InvalidMovePayloadError';
    Object.setPrototypeOf(this, InvalidMovePayloadError.prototype);
  }
}

export class ConfigurationError extends GameError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(GameErrorCode.CONFIGURATION_ERROR, message, context);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPE GUARDS
// ═══════════════════════════════════════════════════════════════════════════

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

export function isInvalidMovePayloadError(error: unknown): error is InvalidMovePayloadError {
  return error instanceof InvalidMovePayloadError;
}
