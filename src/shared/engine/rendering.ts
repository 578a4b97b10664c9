import { BOARD_SIZE, Side } from '../types/game';
import type { ReadonlyBoard } from './Board';
import { EMPTY_GLYPH, glyphFor } from './pieceCatalog';

/**
 * Glyph grid indexed `[rank][file]`, rank 0 first. Presentation layers own
 * orientation, borders and colours.
 */
export function renderBoard(board: ReadonlyBoard): string[][] {
  const grid: string[][] = [];
  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    const row: string[] = [];
    for (let file = 0; file < BOARD_SIZE; file++) {
      const piece = board.get({ file, rank });
      row.push(piece ? glyphFor(piece) : EMPTY_GLYPH);
    }
    grid.push(row);
  }
  return grid;
}

/** Placement plus side to move; equal keys mean a repeated position. */
export function positionKey(board: ReadonlyBoard, turn: Side): string {
  return `${renderBoard(board)
    .map((row) => row.join(''))
    .join('/')}:${turn}`;
}
