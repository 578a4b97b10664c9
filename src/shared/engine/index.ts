// =============================================================================
// RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (GameSession, presentation layers, serializers) import from this
// file only. Everything exported here is pure: state goes in, results or new
// state come out.
// =============================================================================

// Data model
export type { Coordinate, Move, Piece, PieceKind, Side } from '../types/game';
export {
  BOARD_SIZE,
  SIDES,
  opponentOf,
  coordinatesEqual,
  coordinateToString,
} from '../types/game';

// Engine types
export type {
  GameState,
  HistoryEntry,
  PositionView,
  IllegalMoveCode,
  LegalMove,
  ValidationResult,
  ApplyRejectionCode,
  ApplyResult,
  UndoResult,
} from './types';

// Geometry
export { offset, inBounds, directionVector, getPathCoordinates, allCoordinates } from './core';
export type { Direction } from './core';

// Board & pieces
export { Board } from './Board';
export type { ReadonlyBoard, PlacedPiece } from './Board';
export { glyphFor, isShapeLegal, forwardDirection, EMPTY_GLYPH } from './pieceCatalog';

// Validation & queries
export { validateMove } from './validators/MoveValidator';
export { isSquareAttacked, isKingAttacked } from './attackDetection';
export { legalMovesFor, legalMovesFrom, legalMovesForSide, hasAnyLegalMove } from './moveGeneration';

// Game lifecycle
export {
  createInitialBoard,
  createInitialGameState,
  createGameStateFromPosition,
} from './initialState';
export {
  applyMove,
  applyMoveOrThrow,
  undoMove,
  render,
  isInCheck,
  allLegalMoves,
  countRepetitions,
} from './GameEngine';
export { renderBoard, positionKey } from './rendering';

// Status machine
export * from './fsm';

// Notation (display only)
export { formatCoordinate, formatMove, formatLegalMove } from './notation';

// Errors
export {
  EngineError,
  EngineErrorCode,
  RulesViolation,
  InvalidState,
  BoardConstraintViolation,
  isEngineError,
  isRulesViolation,
  isInvalidState,
  isBoardConstraintViolation,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';

/** Alias matching the lifecycle vocabulary used by hosts. */
export { createInitialGameState as newGame } from './initialState';
