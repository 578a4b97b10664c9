import type { Coordinate, Move, Piece, PieceKind, Side } from '../types/game';
import type { ReadonlyBoard } from './Board';
import type { GameStatus } from './fsm';

// Re-export types used in the engine interface
export type { Coordinate, Move, Piece, PieceKind, Side, ReadonlyBoard, GameStatus };

/**
 * One applied move, with enough of the position before it to take it back.
 */
export interface HistoryEntry {
  readonly move: Move;
  /** The moving piece as it stood before the move. */
  readonly piece: Piece;
  readonly captured: Piece | null;
  readonly statusBefore: GameStatus;
  /** Repetition key of the position the move was played from. */
  readonly positionBefore: string;
}

/**
 * Authoritative game state. Fields are readonly and the board is exposed
 * through its read-only view: the only way to change a game is `applyMove`
 * (or `undoMove`), each of which returns a new GameState.
 */
export interface GameState {
  readonly board: ReadonlyBoard;
  readonly turn: Side;
  readonly status: GameStatus;
  readonly history: ReadonlyArray<HistoryEntry>;
}

/** What the validator needs from a state: just the position. */
export type PositionView = Pick<GameState, 'board'>;

/**
 * Validation
 */
export type IllegalMoveCode =
  | 'OUT_OF_BOUNDS'
  | 'NO_PIECE_OR_WRONG_SIDE'
  | 'NULL_MOVE'
  | 'SHAPE_INVALID'
  | 'FRIENDLY_FIRE'
  | 'LEAVES_KING_IN_CHECK';

export interface LegalMove {
  readonly from: Coordinate;
  readonly to: Coordinate;
  readonly kind: PieceKind;
  readonly side: Side;
  readonly isCapture: boolean;
  readonly captured: PieceKind | null;
}

export type ValidationResult =
  | { readonly valid: true; readonly move: LegalMove }
  | { readonly valid: false; readonly code: IllegalMoveCode; readonly reason: string };

/**
 * Application
 */
export type ApplyRejectionCode = IllegalMoveCode | 'GAME_OVER';

export type ApplyResult =
  | { readonly ok: true; readonly state: GameState; readonly applied: LegalMove }
  | { readonly ok: false; readonly code: ApplyRejectionCode; readonly reason: string };

export type UndoResult =
  | { readonly ok: true; readonly state: GameState; readonly undone: Move }
  | { readonly ok: false; readonly code: 'NOTHING_TO_UNDO'; readonly reason: string };
