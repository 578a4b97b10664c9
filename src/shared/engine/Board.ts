import { BOARD_SIZE, Coordinate, Piece, Side, coordinateToString } from '../types/game';
import { allCoordinates, getPathCoordinates, inBounds } from './core';
import { BoardConstraintViolation, EngineErrorCode, InvalidState } from './errors';

export interface PlacedPiece {
  readonly at: Coordinate;
  readonly piece: Piece;
}

/**
 * Read side of the board. GameState exposes only this view so that every
 * mutation goes through move application.
 */
export interface ReadonlyBoard {
  get(c: Coordinate): Piece | undefined;
  isPathClear(from: Coordinate, to: Coordinate): boolean;
  findKing(side: Side): Coordinate;
  pieces(side?: Side): PlacedPiece[];
  clone(): Board;
}

/**
 * Square grid of optional occupants, stored rank-major.
 */
export class Board implements ReadonlyBoard {
  private readonly cells: Array<Array<Piece | undefined>>;

  constructor(cells?: ReadonlyArray<ReadonlyArray<Piece | undefined>>) {
    this.cells = cells
      ? cells.map((row) => [...row])
      : Array.from({ length: BOARD_SIZE }, () =>
          Array.from<Piece | undefined>({ length: BOARD_SIZE })
        );
  }

  get(c: Coordinate): Piece | undefined {
    this.assertOnBoard(c);
    return this.cells[c.rank][c.file];
  }

  place(c: Coordinate, piece: Piece): void {
    this.assertOnBoard(c);
    if (this.cells[c.rank][c.file]) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_CELL_OCCUPIED,
        `Cell ${coordinateToString(c)} is already occupied`,
        { coordinate: c }
      );
    }
    this.cells[c.rank][c.file] = piece;
  }

  remove(c: Coordinate): Piece | undefined {
    this.assertOnBoard(c);
    const removed = this.cells[c.rank][c.file];
    this.cells[c.rank][c.file] = undefined;
    return removed;
  }

  /**
   * True when no cell strictly between the endpoints is occupied. Only
   * meaningful for pairs on a shared line; other pairs have no intervening
   * cells and report clear.
   */
  isPathClear(from: Coordinate, to: Coordinate): boolean {
    this.assertOnBoard(from);
    this.assertOnBoard(to);
    for (const c of getPathCoordinates(from, to)) {
      if (this.cells[c.rank][c.file]) {
        return false;
      }
    }
    return true;
  }

  findKing(side: Side): Coordinate {
    const king = this.pieces(side).find(({ piece }) => piece.kind === 'king');
    if (!king) {
      throw new InvalidState(EngineErrorCode.STATE_KING_NOT_FOUND, `No ${side} king on the board`, {
        side,
      });
    }
    return king.at;
  }

  pieces(side?: Side): PlacedPiece[] {
    const placed: PlacedPiece[] = [];
    for (const at of allCoordinates()) {
      const piece = this.cells[at.rank][at.file];
      if (piece && (side === undefined || piece.side === side)) {
        placed.push({ at, piece });
      }
    }
    return placed;
  }

  clone(): Board {
    return new Board(this.cells);
  }

  private assertOnBoard(c: Coordinate): void {
    if (!inBounds(c)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Coordinate ${coordinateToString(c)} is off the board`,
        { coordinate: c }
      );
    }
  }
}
