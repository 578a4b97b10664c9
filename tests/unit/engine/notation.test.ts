import {
  formatCoordinate,
  formatLegalMove,
  formatMove,
} from '../../../src/shared/engine/notation';
import { createInitialGameState } from '../../../src/shared/engine/initialState';
import { validateMove } from '../../../src/shared/engine/validators/MoveValidator';
import { LegalMove } from '../../../src/shared/engine/types';
import { mv, piece, positionWith, sq } from '../../utils/fixtures';

function legal(result: ReturnType<typeof validateMove>): LegalMove {
  if (!result.valid) {
    throw new Error(`expected a legal move, got ${result.code}`);
  }
  return result.move;
}

describe('notation', () => {
  it('names squares by file letter and rank number', () => {
    expect(formatCoordinate(sq(0, 0))).toBe('a1');
    expect(formatCoordinate(sq(1, 4))).toBe('e2');
    expect(formatCoordinate(sq(7, 7))).toBe('h8');
  });

  it('falls back to a raw pair off the board', () => {
    expect(formatCoordinate({ file: 8, rank: 0 })).toBe('(8,0)');
    expect(formatMove(mv({ file: 8, rank: 0 }, sq(0, 0)))).toBe('(8,0)-a1');
  });

  it('joins both squares of a move', () => {
    expect(formatMove(mv(sq(1, 4), sq(3, 4)))).toBe('e2-e4');
  });

  it('adds piece letters and capture markers to legal moves', () => {
    const opening = createInitialGameState();
    expect(formatLegalMove(legal(validateMove(opening, 'first', mv(sq(1, 4), sq(3, 4)))))).toBe(
      'e2-e4'
    );
    expect(formatLegalMove(legal(validateMove(opening, 'first', mv(sq(0, 6), sq(2, 5)))))).toBe(
      'Ng1-f3'
    );

    const exchange = positionWith([
      [sq(0, 4), piece('king', 'first')],
      [sq(3, 4), piece('pawn', 'first', true)],
      [sq(4, 3), piece('pawn', 'second', true)],
      [sq(7, 4), piece('king', 'second')],
    ]);
    expect(formatLegalMove(legal(validateMove(exchange, 'first', mv(sq(3, 4), sq(4, 3)))))).toBe(
      'e4xd5'
    );
  });
});
