import { Coordinate, Move, PieceKind } from '../types/game';
import { inBounds } from './core';
import type { LegalMove } from './types';

/**
 * Display-only notation for logs, histories and test output. Nothing in the
 * engine parses these strings; turning user input into a Move belongs to
 * the presentation layer.
 */

const KIND_LETTERS: Record<PieceKind, string> = {
  pawn: '',
  knight: 'N',
  bishop: 'B',
  rook: 'R',
  queen: 'Q',
  king: 'K',
};

/**
 * Chess-like square name: file 0 is 'a', rank 0 is '1'. Off-board
 * coordinates fall back to a raw "(file,rank)" tuple.
 */
export function formatCoordinate(c: Coordinate): string {
  if (!inBounds(c)) {
    return `(${c.file},${c.rank})`;
  }
  return `${String.fromCharCode('a'.charCodeAt(0) + c.file)}${c.rank + 1}`;
}

/**
 * Examples:
 *   e2-e4
 *   (8,0)-a1
 */
export function formatMove(move: Move): string {
  return `${formatCoordinate(move.from)}-${formatCoordinate(move.to)}`;
}

/**
 * Long algebraic form of a validated move, with the piece letter and a
 * capture marker: `e2-e4`, `Ng1-f3`, `Bc4xf7`.
 */
export function formatLegalMove(move: LegalMove): string {
  const separator = move.isCapture ? 'x' : '-';
  return `${KIND_LETTERS[move.kind]}${formatCoordinate(move.from)}${separator}${formatCoordinate(move.to)}`;
}
