/**
 * Test Fixtures and Utilities
 * Common positions and helper functions for engine tests
 */

import { Board } from '../../src/shared/engine/Board';
import { createGameStateFromPosition } from '../../src/shared/engine/initialState';
import { GameState } from '../../src/shared/engine/types';
import { Coordinate, Move, Piece, PieceKind, Side } from '../../src/shared/types/game';

/**
 * Square helper, rank first: sq(1, 4) is the First side's king-file pawn.
 */
export function sq(rank: number, file: number): Coordinate {
  return { file, rank };
}

export function mv(from: Coordinate, to: Coordinate): Move {
  return { from, to };
}

export function piece(kind: PieceKind, side: Side, hasMoved: boolean = false): Piece {
  return { kind, side, hasMoved };
}

export type Placement = [Coordinate, Piece];

/**
 * Creates a board holding exactly the given pieces
 */
export function boardWith(placements: Placement[]): Board {
  const board = new Board();
  for (const [at, p] of placements) {
    board.place(at, p);
  }
  return board;
}

/**
 * Creates a GameState for a constructed position with `turn` to move
 */
export function positionWith(placements: Placement[], turn: Side = 'first'): GameState {
  return createGameStateFromPosition(boardWith(placements), turn);
}

/** Fool's mate: First is checkmated after Second's fourth ply. */
export const FOOLS_MATE: Move[] = [
  mv(sq(1, 5), sq(2, 5)), // f2-f3
  mv(sq(6, 4), sq(4, 4)), // e7-e5
  mv(sq(1, 6), sq(3, 6)), // g2-g4
  mv(sq(7, 3), sq(3, 7)), // Qd8-h4
];
