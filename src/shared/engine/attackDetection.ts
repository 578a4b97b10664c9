import { Coordinate, Side, coordinatesEqual, opponentOf } from '../types/game';
import type { ReadonlyBoard } from './Board';
import { isShapeLegal } from './pieceCatalog';

/**
 * True when some piece of `bySide` could move onto `target` by shape and path
 * alone, ignoring whether that move would expose its own king. The target is
 * expected to hold a piece of the other side (typically a king), which is
 * what makes pawn diagonals count.
 */
export function isSquareAttacked(board: ReadonlyBoard, target: Coordinate, bySide: Side): boolean {
  return board
    .pieces(bySide)
    .some(
      ({ at, piece }) =>
        !coordinatesEqual(at, target) && isShapeLegal(board, piece, { from: at, to: target })
    );
}

export function isKingAttacked(board: ReadonlyBoard, side: Side): boolean {
  return isSquareAttacked(board, board.findKing(side), opponentOf(side));
}
