import { Move, Side, coordinateToString, coordinatesEqual } from '../../types/game';
import { debugLog, isValidationDebugEnabled } from '../../utils/envFlags';
import { isKingAttacked } from '../attackDetection';
import { inBounds } from '../core';
import { isShapeLegal } from '../pieceCatalog';
import { IllegalMoveCode, PositionView, ValidationResult } from '../types';

/**
 * Decide whether `mover` may play `move` in the given position.
 *
 * Checks run in a fixed order and stop at the first failure, so a move that
 * is wrong in several ways always reports the same code. Validation never
 * mutates the position; the king-safety check works on a scratch copy.
 */
export function validateMove(state: PositionView, mover: Side, move: Move): ValidationResult {
  const { board } = state;

  // 1. Source on board, holding one of the mover's pieces
  if (!inBounds(move.from)) {
    return reject('OUT_OF_BOUNDS', 'Source square is off the board', move);
  }
  const piece = board.get(move.from);
  if (!piece || piece.side !== mover) {
    return reject('NO_PIECE_OR_WRONG_SIDE', `No ${mover} piece on the source square`, move);
  }

  // 2. Destination on board
  if (!inBounds(move.to)) {
    return reject('OUT_OF_BOUNDS', 'Destination square is off the board', move);
  }

  // 3. Null move
  if (coordinatesEqual(move.from, move.to)) {
    return reject('NULL_MOVE', 'Source and destination are the same square', move);
  }

  // 4. Shape (and the piece's own path requirement)
  if (!isShapeLegal(board, piece, move)) {
    return reject('SHAPE_INVALID', `A ${piece.kind} cannot move that way`, move);
  }

  // 5. Destination occupancy
  const occupant = board.get(move.to);
  if (occupant && occupant.side === mover) {
    return reject('FRIENDLY_FIRE', 'Destination holds a piece of the same side', move);
  }
  // Kings are never taken; positions reached by legal play cannot offer this.
  if (occupant && occupant.kind === 'king') {
    return reject('SHAPE_INVALID', 'Kings cannot be captured', move);
  }

  // 6. King safety, on a scratch copy
  const scratch = board.clone();
  scratch.remove(move.to);
  scratch.remove(move.from);
  scratch.place(move.to, { ...piece, hasMoved: true });
  if (isKingAttacked(scratch, mover)) {
    return reject('LEAVES_KING_IN_CHECK', 'Move would leave the king attacked', move);
  }

  return {
    valid: true,
    move: {
      from: move.from,
      to: move.to,
      kind: piece.kind,
      side: piece.side,
      isCapture: occupant !== undefined,
      captured: occupant ? occupant.kind : null,
    },
  };
}

function reject(code: IllegalMoveCode, reason: string, move: Move): ValidationResult {
  debugLog(isValidationDebugEnabled(), '[validateMove] rejected', {
    code,
    reason,
    from: coordinateToString(move.from),
    to: coordinateToString(move.to),
  });
  return { valid: false, code, reason };
}
