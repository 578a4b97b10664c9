import { Board } from '../../../src/shared/engine/Board';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
} from '../../../src/shared/engine/errors';
import { createInitialBoard } from '../../../src/shared/engine/initialState';
import { boardWith, piece, sq } from '../../utils/fixtures';

describe('Board', () => {
  let board: Board;

  beforeEach(() => {
    board = new Board();
  });

  describe('cells', () => {
    it('starts empty', () => {
      expect(board.get(sq(3, 3))).toBeUndefined();
      expect(board.pieces()).toEqual([]);
    });

    it('places and reads back a piece', () => {
      board.place(sq(2, 5), piece('knight', 'second'));
      expect(board.get(sq(2, 5))).toEqual({ kind: 'knight', side: 'second', hasMoved: false });
    });

    it('refuses to place onto an occupied cell', () => {
      board.place(sq(2, 5), piece('knight', 'second'));
      expect(() => board.place(sq(2, 5), piece('rook', 'first'))).toThrow(
        BoardConstraintViolation
      );
      try {
        board.place(sq(2, 5), piece('rook', 'first'));
      } catch (error) {
        expect(error).toMatchObject({ code: EngineErrorCode.BOARD_CELL_OCCUPIED });
      }
    });

    it('removes and returns the occupant', () => {
      board.place(sq(4, 4), piece('queen', 'first'));
      expect(board.remove(sq(4, 4))).toEqual(piece('queen', 'first'));
      expect(board.get(sq(4, 4))).toBeUndefined();
      expect(board.remove(sq(4, 4))).toBeUndefined();
    });

    it('throws BOARD_INVALID_POSITION for off-board coordinates', () => {
      expect(() => board.get({ file: 8, rank: 0 })).toThrow('Coordinate 8,0 is off the board');
      expect(() => board.remove({ file: 0, rank: -1 })).toThrow(BoardConstraintViolation);
      expect(() => board.place({ file: -1, rank: 3 }, piece('pawn', 'first'))).toThrow(
        BoardConstraintViolation
      );
    });
  });

  describe('isPathClear', () => {
    it('reports a blocked rank', () => {
      board.place(sq(0, 3), piece('pawn', 'second'));
      expect(board.isPathClear(sq(0, 0), sq(0, 7))).toBe(false);
    });

    it('ignores occupants on the endpoints', () => {
      board.place(sq(0, 0), piece('rook', 'first'));
      board.place(sq(0, 7), piece('rook', 'second'));
      expect(board.isPathClear(sq(0, 0), sq(0, 7))).toBe(true);
    });

    it('refuses off-board endpoints', () => {
      expect(() => board.isPathClear(sq(0, 0), { file: 10, rank: 0 })).toThrow(
        BoardConstraintViolation
      );
      expect(() => board.isPathClear({ file: -1, rank: 3 }, sq(3, 4))).toThrow(
        'Coordinate -1,3 is off the board'
      );
    });

    it('reports a blocked diagonal', () => {
      board.place(sq(3, 3), piece('pawn', 'first'));
      expect(board.isPathClear(sq(0, 0), sq(6, 6))).toBe(false);
      expect(board.isPathClear(sq(0, 0), sq(2, 2))).toBe(true);
    });
  });

  describe('findKing', () => {
    it('locates each king on the opening board', () => {
      const initial = createInitialBoard();
      expect(initial.findKing('first')).toEqual(sq(0, 4));
      expect(initial.findKing('second')).toEqual(sq(7, 4));
    });

    it('throws InvalidState when a king is missing', () => {
      const onlyFirst = boardWith([[sq(0, 4), piece('king', 'first')]]);
      expect(() => onlyFirst.findKing('second')).toThrow(InvalidState);
    });
  });

  it('lists pieces by side', () => {
    const initial = createInitialBoard();
    expect(initial.pieces('first')).toHaveLength(16);
    expect(initial.pieces('second')).toHaveLength(16);
    expect(initial.pieces()).toHaveLength(32);
  });

  it('clones independently', () => {
    board.place(sq(1, 1), piece('bishop', 'first'));
    const copy = board.clone();
    copy.remove(sq(1, 1));
    copy.place(sq(5, 5), piece('rook', 'second'));

    expect(board.get(sq(1, 1))).toEqual(piece('bishop', 'first'));
    expect(board.get(sq(5, 5))).toBeUndefined();
  });
});
