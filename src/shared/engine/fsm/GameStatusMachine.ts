/**
 * GameStatusMachine - game-level status transitions
 *
 * States are a discriminated union; every (state, event) pair either yields
 * the next state or a typed error. The machine does not inspect the board:
 * the engine evaluates the position after each move and reports the facts
 * (is the opponent's king attacked, does the opponent have a legal move) as
 * part of the event.
 *
 * @module GameStatusMachine
 */

import { Side, opponentOf } from '../../types/game';

// ═══════════════════════════════════════════════════════════════════════════
// STATES
// ═══════════════════════════════════════════════════════════════════════════

export type GameStatus = ToMoveStatus | CheckStatus | CheckmateStatus | StalemateStatus;

export interface ToMoveStatus {
  readonly kind: 'to_move';
  readonly side: Side;
}

/** `side` is to move and its king is attacked. */
export interface CheckStatus {
  readonly kind: 'check';
  readonly side: Side;
}

export interface CheckmateStatus {
  readonly kind: 'checkmate';
  readonly loser: Side;
}

export interface StalemateStatus {
  readonly kind: 'stalemate';
}

// ═══════════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════════

export type StatusEvent = {
  readonly type: 'MOVE_APPLIED';
  readonly mover: Side;
  /** Whether the mover's opponent is attacked after the move. */
  readonly opponentAttacked: boolean;
  /** Whether the mover's opponent has at least one legal reply. */
  readonly opponentHasMoves: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION RESULT
// ═══════════════════════════════════════════════════════════════════════════

export type StatusTransitionResult =
  | { readonly ok: true; readonly status: GameStatus }
  | { readonly ok: false; readonly error: StatusTransitionError };

export interface StatusTransitionError {
  readonly code: 'GAME_OVER' | 'NOT_YOUR_TURN';
  readonly message: string;
  readonly currentStatus: GameStatus['kind'];
}

// ═══════════════════════════════════════════════════════════════════════════
// QUERIES
// ═══════════════════════════════════════════════════════════════════════════

export function isTerminal(status: GameStatus): status is CheckmateStatus | StalemateStatus {
  return status.kind === 'checkmate' || status.kind === 'stalemate';
}

/** Side to move, or null once the game has ended. */
export function sideToMove(status: GameStatus): Side | null {
  switch (status.kind) {
    case 'to_move':
    case 'check':
      return status.side;
    case 'checkmate':
    case 'stalemate':
      return null;
  }
}

/**
 * Status for a position in which `side` is to move.
 *
 * | attacked | has moves | status      |
 * |----------|-----------|-------------|
 * | no       | yes       | to_move     |
 * | yes      | yes       | check       |
 * | yes      | no        | checkmate   |
 * | no       | no        | stalemate   |
 */
export function statusForPosition(side: Side, attacked: boolean, hasMoves: boolean): GameStatus {
  if (hasMoves) {
    return attacked ? { kind: 'check', side } : { kind: 'to_move', side };
  }
  return attacked ? { kind: 'checkmate', loser: side } : { kind: 'stalemate' };
}

// ═══════════════════════════════════════════════════════════════════════════
// TRANSITION
// ═══════════════════════════════════════════════════════════════════════════

export function transition(status: GameStatus, event: StatusEvent): StatusTransitionResult {
  if (isTerminal(status)) {
    return failed(status, 'GAME_OVER', 'Game is over - no transitions allowed');
  }
  if (event.mover !== status.side) {
    return failed(status, 'NOT_YOUR_TURN', `It is ${status.side}'s turn, not ${event.mover}'s`);
  }
  return {
    ok: true,
    status: statusForPosition(
      opponentOf(event.mover),
      event.opponentAttacked,
      event.opponentHasMoves
    ),
  };
}

function failed(
  status: GameStatus,
  code: StatusTransitionError['code'],
  message: string
): StatusTransitionResult {
  return { ok: false, error: { code, message, currentStatus: status.kind } };
}
