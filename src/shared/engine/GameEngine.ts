import { Move, Side, opponentOf } from '../types/game';
import { isKingAttacked } from './attackDetection';
import { EngineError, EngineErrorCode, RulesViolation } from './errors';
import { isTerminal, transition } from './fsm';
import { hasAnyLegalMove, legalMovesForSide } from './moveGeneration';
import { positionKey, renderBoard } from './rendering';
import { ApplyResult, GameState, HistoryEntry, LegalMove, UndoResult } from './types';
import { validateMove } from './validators/MoveValidator';
import { formatMove } from './notation';

/**
 * Game operations. Every function takes a GameState and, where the game
 * changes, returns a new one; the input state is never modified.
 */

/**
 * Validate `move` for the side to move and, if legal, play it: remove any
 * captured piece, move the piece (marking it as moved), record the move and
 * evaluate the opponent's situation to decide the next status.
 */
export function applyMove(state: GameState, move: Move): ApplyResult {
  if (isTerminal(state.status)) {
    return { ok: false, code: 'GAME_OVER', reason: 'The game has already ended' };
  }

  const validation = validateMove(state, state.turn, move);
  if (!validation.valid) {
    return { ok: false, code: validation.code, reason: validation.reason };
  }

  const board = state.board.clone();
  const captured = board.remove(move.to) ?? null;
  const piece = board.remove(move.from);
  if (!piece) {
    // validateMove has confirmed the source is occupied
    throw new EngineError(
      EngineErrorCode.INTERNAL_ASSERTION_FAILED,
      'Validated source square is empty',
      { move },
      'GameEngine'
    );
  }
  board.place(move.to, { ...piece, hasMoved: true });

  const mover = state.turn;
  const opponent = opponentOf(mover);
  const next = transition(state.status, {
    type: 'MOVE_APPLIED',
    mover,
    opponentAttacked: isKingAttacked(board, opponent),
    opponentHasMoves: hasAnyLegalMove({ board }, opponent),
  });
  if (!next.ok) {
    return { ok: false, code: 'GAME_OVER', reason: next.error.message };
  }

  const entry: HistoryEntry = {
    move,
    piece,
    captured,
    statusBefore: state.status,
    positionBefore: positionKey(state.board, state.turn),
  };

  return {
    ok: true,
    applied: validation.move,
    state: {
      board,
      turn: opponent,
      status: next.status,
      history: [...state.history, entry],
    },
  };
}

/**
 * As applyMove, but a rejection throws. For replaying move lists that are
 * already known to be legal.
 */
export function applyMoveOrThrow(state: GameState, move: Move): GameState {
  const result = applyMove(state, move);
  if (!result.ok) {
    throw new RulesViolation(
      result.code === 'GAME_OVER'
        ? EngineErrorCode.RULES_GAME_OVER
        : EngineErrorCode.RULES_ILLEGAL_MOVE,
      `Cannot apply ${formatMove(move)}: ${result.reason}`,
      { move, code: result.code, ply: state.history.length },
      'GameEngine'
    );
  }
  return result.state;
}

/** The state before the last applied move. */
export function undoMove(state: GameState): UndoResult {
  const last = state.history[state.history.length - 1];
  if (!last) {
    return { ok: false, code: 'NOTHING_TO_UNDO', reason: 'No moves have been played' };
  }

  const board = state.board.clone();
  board.remove(last.move.to);
  board.place(last.move.from, last.piece);
  if (last.captured) {
    board.place(last.move.to, last.captured);
  }

  return {
    ok: true,
    undone: last.move,
    state: {
      board,
      turn: last.piece.side,
      status: last.statusBefore,
      history: state.history.slice(0, -1),
    },
  };
}

/** Glyph grid of the current position, `[rank][file]`. */
export function render(state: GameState): string[][] {
  return renderBoard(state.board);
}

export function isInCheck(state: GameState, side: Side): boolean {
  return isKingAttacked(state.board, side);
}

/** All legal moves for the side to move; empty once the game has ended. */
export function allLegalMoves(state: GameState): LegalMove[] {
  if (isTerminal(state.status)) return [];
  return legalMovesForSide(state, state.turn);
}

/**
 * Occurrences of the current position (placement and side to move) along
 * the game, counting the current one. A host enforcing threefold
 * repetition checks for a result of 3 or more.
 */
export function countRepetitions(state: GameState): number {
  const current = positionKey(state.board, state.turn);
  return 1 + state.history.filter((entry) => entry.positionBefore === current).length;
}
