/** Width and height of the square board. */
export const BOARD_SIZE = 8;

/**
 * The two players. First moves first and starts on ranks 0-1; Second starts
 * on ranks 6-7. An empty cell is modelled by the absence of a Piece, never by
 * a third side.
 */
export type Side = 'first' | 'second';

export const SIDES: ReadonlyArray<Side> = ['first', 'second'];

export type PieceKind = 'pawn' | 'knight' | 'bishop' | 'rook' | 'queen' | 'king';

/**
 * A square on the board. Cell coordinates satisfy 0 <= file, rank < BOARD_SIZE;
 * off-board values are representable (move targets may be anything) and are
 * rejected explicitly rather than clamped.
 */
export interface Coordinate {
  readonly file: number;
  readonly rank: number;
}

export interface Piece {
  readonly kind: PieceKind;
  readonly side: Side;
  readonly hasMoved: boolean;
}

export interface Move {
  readonly from: Coordinate;
  readonly to: Coordinate;
}

export const opponentOf = (side: Side): Side => (side === 'first' ? 'second' : 'first');

export const coordinateToString = (c: Coordinate): string => `${c.file},${c.rank}`;

export const coordinatesEqual = (a: Coordinate, b: Coordinate): boolean =>
  a.file === b.file && a.rank === b.rank;
