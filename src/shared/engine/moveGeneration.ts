import { Coordinate, Piece, Side } from '../types/game';
import { inBounds, offset } from './core';
import { candidateOffsets } from './pieceCatalog';
import { GameState, LegalMove, PositionView } from './types';
import { validateMove } from './validators/MoveValidator';
import { sideToMove } from './fsm';

/** In-bounds destinations from the piece's movement pattern, before validation. */
function candidateDestinations(from: Coordinate, piece: Piece): Coordinate[] {
  return candidateOffsets(piece.kind, piece.side)
    .map(([dFile, dRank]) => offset(from, dFile, dRank))
    .filter(inBounds);
}

/**
 * Every legal move for the piece on `from`, assuming `side` is to move.
 * Candidates come from the piece's movement pattern and are each confirmed
 * by the validator.
 */
export function legalMovesFrom(state: PositionView, side: Side, from: Coordinate): LegalMove[] {
  if (!inBounds(from)) return [];
  const piece = state.board.get(from);
  if (!piece || piece.side !== side) return [];

  const moves: LegalMove[] = [];
  for (const to of candidateDestinations(from, piece)) {
    const result = validateMove(state, side, { from, to });
    if (result.valid) {
      moves.push(result.move);
    }
  }
  return moves;
}

export function legalMovesForSide(state: PositionView, side: Side): LegalMove[] {
  return state.board.pieces(side).flatMap(({ at }) => legalMovesFrom(state, side, at));
}

/** Stops validating at the first legal move found. */
export function hasAnyLegalMove(state: PositionView, side: Side): boolean {
  return state.board
    .pieces(side)
    .some(({ at, piece }) =>
      candidateDestinations(at, piece).some(
        (to) => validateMove(state, side, { from: at, to }).valid
      )
    );
}

/**
 * Destinations reachable from `from` for the side to move. Empty when the
 * square is empty, holds the other side's piece, or the game is over.
 */
export function legalMovesFor(state: GameState, from: Coordinate): Coordinate[] {
  const side = sideToMove(state.status);
  if (side === null) return [];
  return legalMovesFrom(state, side, from).map((m) => m.to);
}
