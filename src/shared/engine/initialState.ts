import { BOARD_SIZE, PieceKind, SIDES, Side } from '../types/game';
import { Board, ReadonlyBoard } from './Board';
import { isKingAttacked } from './attackDetection';
import { EngineErrorCode, InvalidState } from './errors';
import { statusForPosition } from './fsm';
import { hasAnyLegalMove } from './moveGeneration';
import { GameState } from './types';

/** Back-rank layout by file. */
const BACK_RANK: ReadonlyArray<PieceKind> = [
  'rook',
  'knight',
  'bishop',
  'queen',
  'king',
  'bishop',
  'knight',
  'rook',
];

function fillSide(board: Board, side: Side, backRank: number, pawnRank: number): void {
  for (let file = 0; file < BOARD_SIZE; file++) {
    board.place({ file, rank: backRank }, { kind: BACK_RANK[file], side, hasMoved: false });
    board.place({ file, rank: pawnRank }, { kind: 'pawn', side, hasMoved: false });
  }
}

/** Standard starting position: First on ranks 0-1, Second on ranks 6-7. */
export function createInitialBoard(): Board {
  const board = new Board();
  fillSide(board, 'first', 0, 1);
  fillSide(board, 'second', BOARD_SIZE - 1, BOARD_SIZE - 2);
  return board;
}

/**
 * Creates a pristine GameState for a new game, First side to move.
 */
export function createInitialGameState(): GameState {
  return {
    board: createInitialBoard(),
    turn: 'first',
    status: { kind: 'to_move', side: 'first' },
    history: [],
  };
}

/**
 * Creates a GameState for an arbitrary position with `turn` to move and no
 * history. The status is evaluated from the position, so a constructed
 * mate or stalemate starts out terminal. The board is copied; later changes
 * to the caller's board do not reach the game.
 *
 * Each side must have exactly one king; otherwise this throws InvalidState.
 */
export function createGameStateFromPosition(board: ReadonlyBoard, turn: Side): GameState {
  assertOneKingPerSide(board);
  const owned = board.clone();
  const attacked = isKingAttacked(owned, turn);
  const hasMoves = hasAnyLegalMove({ board: owned }, turn);
  return {
    board: owned,
    turn,
    status: statusForPosition(turn, attacked, hasMoves),
    history: [],
  };
}

function assertOneKingPerSide(board: ReadonlyBoard): void {
  for (const side of SIDES) {
    const kings = board.pieces(side).filter(({ piece }) => piece.kind === 'king');
    if (kings.length === 0) {
      throw new InvalidState(EngineErrorCode.STATE_KING_NOT_FOUND, `No ${side} king on the board`, {
        side,
      });
    }
    if (kings.length > 1) {
      throw new InvalidState(
        EngineErrorCode.STATE_DUPLICATE_KING,
        `${side} has ${kings.length} kings on the board`,
        { side, squares: kings.map(({ at }) => at) }
      );
    }
  }
}
