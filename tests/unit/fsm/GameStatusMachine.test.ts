/**
 * Unit tests for the game status machine
 */

import {
  GameStatus,
  StatusEvent,
  isTerminal,
  sideToMove,
  statusForPosition,
  transition,
} from '../../../src/shared/engine/fsm';

function moveApplied(
  mover: StatusEvent['mover'],
  opponentAttacked: boolean,
  opponentHasMoves: boolean
): StatusEvent {
  return { type: 'MOVE_APPLIED', mover, opponentAttacked, opponentHasMoves };
}

describe('GameStatusMachine', () => {
  describe('statusForPosition', () => {
    it.each([
      [false, true, { kind: 'to_move', side: 'second' }],
      [true, true, { kind: 'check', side: 'second' }],
      [true, false, { kind: 'checkmate', loser: 'second' }],
      [false, false, { kind: 'stalemate' }],
    ])('attacked=%s, hasMoves=%s', (attacked, hasMoves, expected) => {
      expect(statusForPosition('second', attacked, hasMoves)).toEqual(expected);
    });
  });

  describe('queries', () => {
    it('identifies terminal statuses', () => {
      expect(isTerminal({ kind: 'to_move', side: 'first' })).toBe(false);
      expect(isTerminal({ kind: 'check', side: 'first' })).toBe(false);
      expect(isTerminal({ kind: 'checkmate', loser: 'first' })).toBe(true);
      expect(isTerminal({ kind: 'stalemate' })).toBe(true);
    });

    it('reports the side to move only while the game is live', () => {
      expect(sideToMove({ kind: 'to_move', side: 'second' })).toBe('second');
      expect(sideToMove({ kind: 'check', side: 'first' })).toBe('first');
      expect(sideToMove({ kind: 'checkmate', loser: 'first' })).toBeNull();
      expect(sideToMove({ kind: 'stalemate' })).toBeNull();
    });
  });

  describe('transition', () => {
    const toMoveFirst: GameStatus = { kind: 'to_move', side: 'first' };

    it('hands the move to the opponent', () => {
      expect(transition(toMoveFirst, moveApplied('first', false, true))).toEqual({
        ok: true,
        status: { kind: 'to_move', side: 'second' },
      });
    });

    it('moves out of check like any other status', () => {
      const inCheck: GameStatus = { kind: 'check', side: 'second' };
      expect(transition(inCheck, moveApplied('second', true, true))).toEqual({
        ok: true,
        status: { kind: 'check', side: 'first' },
      });
    });

    it('ends the game on checkmate and stalemate', () => {
      expect(transition(toMoveFirst, moveApplied('first', true, false))).toEqual({
        ok: true,
        status: { kind: 'checkmate', loser: 'second' },
      });
      expect(transition(toMoveFirst, moveApplied('first', false, false))).toEqual({
        ok: true,
        status: { kind: 'stalemate' },
      });
    });

    it('refuses the wrong mover', () => {
      const result = transition(toMoveFirst, moveApplied('second', false, true));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toEqual({
          code: 'NOT_YOUR_TURN',
          message: "It is first's turn, not second's",
          currentStatus: 'to_move',
        });
      }
    });

    it.each<GameStatus>([{ kind: 'checkmate', loser: 'second' }, { kind: 'stalemate' }])(
      'refuses every event once the game is over (%o)',
      (terminal) => {
        for (const mover of ['first', 'second'] as const) {
          const result = transition(terminal, moveApplied(mover, false, true));
          expect(result.ok).toBe(false);
          if (!result.ok) {
            expect(result.error.code).toBe('GAME_OVER');
            expect(result.error.message).toBe('Game is over - no transitions allowed');
            expect(result.error.currentStatus).toBe(terminal.kind);
          }
        }
      }
    );
  });
});
