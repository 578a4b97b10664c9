/**
 * Engine Domain Errors - Structured error types for the rules engine layer
 *
 * Illegal moves are NOT errors: the validator and `applyMove` report them as
 * typed result values and leave state untouched. The classes here cover the
 * remaining cases:
 *
 * - **RulesViolation**: a caller demanded that a move be applied
 *   (`applyMoveOrThrow`) and the rules refused it
 * - **InvalidState**: corrupted or unexpected game state (e.g. a missing king)
 * - **BoardConstraintViolation**: a board cell was addressed off the board
 *
 * Usage:
 * ```typescript
 * import { BoardConstraintViolation, EngineErrorCode } from './errors';
 *
 * throw new BoardConstraintViolation(
 *   EngineErrorCode.BOARD_INVALID_POSITION,
 *   'Coordinate is off the board',
 *   { coordinate: { file: 8, rank: 0 } }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - RULES_*: Moves the rules refuse
 * - STATE_*: Game state corruption/inconsistency
 * - BOARD_*: Board geometry issues
 */
export enum EngineErrorCode {
  /** Move failed validation when the caller required it to succeed */
  RULES_ILLEGAL_MOVE = 'RULES_ILLEGAL_MOVE',
  /** Move attempted after checkmate or stalemate */
  RULES_GAME_OVER = 'RULES_GAME_OVER',

  /** A side has no king on the board */
  STATE_KING_NOT_FOUND = 'STATE_KING_NOT_FOUND',
  /** A side has more than one king on the board */
  STATE_DUPLICATE_KING = 'STATE_DUPLICATE_KING',

  /** Coordinate outside the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
  /** Placement onto an occupied cell */
  BOARD_CELL_OCCUPIED = 'BOARD_CELL_OCCUPIED',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  RULES_: 'Game rule violation',
  STATE_: 'Corrupted or unexpected game state',
  BOARD_: 'Board geometry constraint violation',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Domain that generated the error (e.g., 'Board', 'GameEngine') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging/debugging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown when a move must be applied but the rules refuse it, e.g. while
 * replaying a history that is expected to be legal.
 */
export class RulesViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Rules'
  ) {
    super(code, message, context, domain);
    this.name = 'RulesViolation';
    Object.setPrototypeOf(this, RulesViolation.prototype);
  }
}

/**
 * Thrown when expected game state elements are missing. This indicates a
 * hand-built position that breaks the board invariants, or a bug.
 */
export class InvalidState extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'State'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidState';
    Object.setPrototypeOf(this, InvalidState.prototype);
  }
}

/**
 * Thrown when a board operation addresses a cell outside the grid or places
 * onto an occupied cell.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isRulesViolation(error: unknown): error is RulesViolation {
  return error instanceof RulesViolation;
}

export function isInvalidState(error: unknown): error is InvalidState {
  return error instanceof InvalidState;
}

export function isBoardConstraintViolation(error: unknown): error is BoardConstraintViolation {
  return error instanceof BoardConstraintViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Useful for catching and normalizing errors at domain boundaries.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
