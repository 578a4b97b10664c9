import { BOARD_SIZE, Coordinate } from '../types/game';

/**
 * Pure board geometry. Nothing here looks at occupants; callers combine
 * these helpers with a Board to answer occupancy questions.
 */

/** Unit step (each component in -1, 0, 1) used when walking a straight line. */
export interface Direction {
  readonly dFile: number;
  readonly dRank: number;
}

/** Arithmetic only; the result may lie off the board. */
export function offset(c: Coordinate, dFile: number, dRank: number): Coordinate {
  return { file: c.file + dFile, rank: c.rank + dRank };
}

export function inBounds(c: Coordinate): boolean {
  return (
    Number.isInteger(c.file) &&
    Number.isInteger(c.rank) &&
    c.file >= 0 &&
    c.file < BOARD_SIZE &&
    c.rank >= 0 &&
    c.rank < BOARD_SIZE
  );
}

export function directionVector(from: Coordinate, to: Coordinate): Direction {
  return { dFile: Math.sign(to.file - from.file), dRank: Math.sign(to.rank - from.rank) };
}

/**
 * Squares strictly between `from` and `to` when the two lie on a shared rank,
 * file or diagonal. Returns an empty list for any other pair.
 */
export function getPathCoordinates(from: Coordinate, to: Coordinate): Coordinate[] {
  const dFile = to.file - from.file;
  const dRank = to.rank - from.rank;
  const straight = dFile === 0 || dRank === 0 || Math.abs(dFile) === Math.abs(dRank);
  if (!straight) {
    return [];
  }

  const { dFile: stepFile, dRank: stepRank } = directionVector(from, to);
  const path: Coordinate[] = [];
  let current = offset(from, stepFile, stepRank);
  while (current.file !== to.file || current.rank !== to.rank) {
    path.push(current);
    current = offset(current, stepFile, stepRank);
  }
  return path;
}

/** Every on-board coordinate, rank-major from (file 0, rank 0). */
export function allCoordinates(): Coordinate[] {
  const coords: Coordinate[] = [];
  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    for (let file = 0; file < BOARD_SIZE; file++) {
      coords.push({ file, rank });
    }
  }
  return coords;
}
