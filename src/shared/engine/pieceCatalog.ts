import { BOARD_SIZE, Move, Piece, PieceKind, Side } from '../types/game';
import type { ReadonlyBoard } from './Board';

/**
 * Piece catalog: display glyphs and per-kind movement shapes.
 *
 * Shape predicates answer "does this geometry match how the piece moves",
 * including the piece's own path-clear requirement. They do not look at
 * whether the destination holds a friendly piece (except for pawns, whose
 * capture rule depends on the occupant) and never consider king safety;
 * both belong to the move validator.
 */

const FIRST_SIDE_GLYPHS: Record<PieceKind, string> = {
  pawn: 'P',
  knight: 'N',
  bishop: 'B',
  rook: 'R',
  queen: 'Q',
  king: 'K',
};

/** Glyph shown for a cell with no occupant. */
export const EMPTY_GLYPH = ' ';

export function glyphFor(piece: Pick<Piece, 'kind' | 'side'>): string {
  const glyph = FIRST_SIDE_GLYPHS[piece.kind];
  return piece.side === 'first' ? glyph : glyph.toLowerCase();
}

/** Rank delta of a single forward pawn step. */
export function forwardDirection(side: Side): 1 | -1 {
  return side === 'first' ? 1 : -1;
}

function deltas(move: Move): { dFile: number; dRank: number } {
  return { dFile: move.to.file - move.from.file, dRank: move.to.rank - move.from.rank };
}

function isPawnShapeLegal(board: ReadonlyBoard, pawn: Piece, move: Move): boolean {
  const { dFile, dRank } = deltas(move);
  const forward = forwardDirection(pawn.side);
  const occupant = board.get(move.to);

  if (dFile === 0) {
    if (occupant) return false;
    if (dRank === forward) return true;
    if (dRank === 2 * forward && !pawn.hasMoved) {
      return board.isPathClear(move.from, move.to);
    }
    return false;
  }

  // Diagonal steps are captures only.
  if (Math.abs(dFile) === 1 && dRank === forward) {
    return occupant !== undefined && occupant.side !== pawn.side;
  }
  return false;
}

function isRookShapeLegal(board: ReadonlyBoard, move: Move): boolean {
  const { dFile, dRank } = deltas(move);
  if ((dFile === 0) === (dRank === 0)) return false;
  return board.isPathClear(move.from, move.to);
}

function isBishopShapeLegal(board: ReadonlyBoard, move: Move): boolean {
  const { dFile, dRank } = deltas(move);
  if (dFile === 0 || Math.abs(dFile) !== Math.abs(dRank)) return false;
  return board.isPathClear(move.from, move.to);
}

function isKnightShapeLegal(move: Move): boolean {
  const dFile = Math.abs(move.to.file - move.from.file);
  const dRank = Math.abs(move.to.rank - move.from.rank);
  return (dFile === 1 && dRank === 2) || (dFile === 2 && dRank === 1);
}

function isKingShapeLegal(move: Move): boolean {
  const dFile = Math.abs(move.to.file - move.from.file);
  const dRank = Math.abs(move.to.rank - move.from.rank);
  return dFile <= 1 && dRank <= 1 && !(dFile === 0 && dRank === 0);
}

/**
 * Shape-and-path legality for `piece` making `move`. Both endpoints must
 * already be known to lie on the board.
 */
export function isShapeLegal(board: ReadonlyBoard, piece: Piece, move: Move): boolean {
  switch (piece.kind) {
    case 'pawn':
      return isPawnShapeLegal(board, piece, move);
    case 'rook':
      return isRookShapeLegal(board, move);
    case 'bishop':
      return isBishopShapeLegal(board, move);
    case 'knight':
      return isKnightShapeLegal(move);
    case 'queen':
      return isRookShapeLegal(board, move) || isBishopShapeLegal(board, move);
    case 'king':
      return isKingShapeLegal(move);
  }
}

/**
 * Offsets a piece of this kind could possibly reach in one move on an empty
 * board. Used to bound legal-move enumeration; every candidate is still
 * run through the validator.
 */
export function candidateOffsets(kind: PieceKind, side: Side): ReadonlyArray<[number, number]> {
  switch (kind) {
    case 'pawn': {
      const f = forwardDirection(side);
      return [
        [0, f],
        [0, 2 * f],
        [-1, f],
        [1, f],
      ];
    }
    case 'knight':
      return KNIGHT_OFFSETS;
    case 'king':
      return KING_OFFSETS;
    case 'rook':
      return ROOK_RAYS;
    case 'bishop':
      return BISHOP_RAYS;
    case 'queen':
      return [...ROOK_RAYS, ...BISHOP_RAYS];
  }
}

const KNIGHT_OFFSETS: ReadonlyArray<[number, number]> = [
  [1, 2],
  [2, 1],
  [2, -1],
  [1, -2],
  [-1, -2],
  [-2, -1],
  [-2, 1],
  [-1, 2],
];

const KING_OFFSETS: ReadonlyArray<[number, number]> = [
  [1, 0],
  [1, 1],
  [0, 1],
  [-1, 1],
  [-1, 0],
  [-1, -1],
  [0, -1],
  [1, -1],
];

function ray(dFile: number, dRank: number): Array<[number, number]> {
  const steps: Array<[number, number]> = [];
  for (let n = 1; n < BOARD_SIZE; n++) {
    steps.push([dFile * n, dRank * n]);
  }
  return steps;
}

const ROOK_RAYS: ReadonlyArray<[number, number]> = [
  ...ray(1, 0),
  ...ray(-1, 0),
  ...ray(0, 1),
  ...ray(0, -1),
];

const BISHOP_RAYS: ReadonlyArray<[number, number]> = [
  ...ray(1, 1),
  ...ray(1, -1),
  ...ray(-1, 1),
  ...ray(-1, -1),
];
