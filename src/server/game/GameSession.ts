import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import {
  ApplyResult,
  Coordinate,
  GameState,
  GameStatus,
  Move,
  Side,
  UndoResult,
  applyMove,
  applyMoveOrThrow,
  countRepetitions,
  createInitialGameState,
  formatLegalMove,
  formatMove,
  isTerminal,
  legalMovesFor,
  render,
  undoMove,
  wrapEngineError,
} from '../../shared/engine';
import { InvalidMovePayloadError } from '../../shared/errors';
import { MoveListSchema, MoveSchema } from '../../shared/validation/schemas';
import { logger as defaultLogger } from '../utils/logger';

export interface GameSessionOptions {
  gameId?: string;
  /** Position to start from; defaults to the standard opening position. */
  initialState?: GameState;
  logger?: Logger;
}

/**
 * GameSession hosts one game for a presentation layer:
 * - holds the current GameState and is the only place it is replaced
 * - validates incoming move payloads before they reach the rules
 * - logs accepted moves, rejections and the end of the game
 *
 * Every operation is synchronous and runs to completion, so calls on one
 * session are serialised by the event loop. A host that spreads a session
 * across threads or processes must put its own lock around `submitMove` and
 * `undo`.
 */
export class GameSession {
  public readonly gameId: string;
  private state: GameState;
  private readonly logger: Logger;

  constructor(options: GameSessionOptions = {}) {
    this.gameId = options.gameId ?? randomUUID();
    this.state = options.initialState ?? createInitialGameState();
    this.logger = options.logger ?? defaultLogger;

    this.logger.debug('Game session created', {
      gameId: this.gameId,
      status: this.state.status,
    });
  }

  /**
   * Rebuild a session by playing a list of moves from the opening position.
   * The list must be well formed and every move legal in sequence.
   */
  static replay(moves: unknown, options: Omit<GameSessionOptions, 'initialState'> = {}): GameSession {
    const parsed = MoveListSchema.safeParse(moves);
    if (!parsed.success) {
      throw new InvalidMovePayloadError(describeIssues(parsed.error.issues), { moves });
    }
    const state = parsed.data.reduce<GameState>(
      (current, move) => applyMoveOrThrow(current, move),
      createInitialGameState()
    );
    return new GameSession({ ...options, initialState: state });
  }

  getState(): GameState {
    return this.state;
  }

  get status(): GameStatus {
    return this.state.status;
  }

  get turn(): Side {
    return this.state.turn;
  }

  get isOver(): boolean {
    return isTerminal(this.state.status);
  }

  /** Moves played so far, oldest first. */
  history(): Move[] {
    return this.state.history.map((entry) => entry.move);
  }

  /**
   * Submit a move in structured form. A payload that is not a move throws
   * InvalidMovePayloadError; a move the rules refuse comes back as a
   * rejected result and the game is unchanged.
   */
  submitMove(payload: unknown): ApplyResult {
    const parsed = MoveSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn('Malformed move payload', { gameId: this.gameId, payload });
      throw new InvalidMovePayloadError(describeIssues(parsed.error.issues), { payload });
    }

    const move: Move = parsed.data;
    let result: ApplyResult;
    try {
      result = applyMove(this.state, move);
    } catch (error) {
      const engineError = wrapEngineError(error, 'GameSession', { gameId: this.gameId });
      this.logger.error('Engine failure while applying move', {
        gameId: this.gameId,
        move: formatMove(move),
        error: engineError.toJSON(),
      });
      throw engineError;
    }
    if (!result.ok) {
      this.logger.info('Move rejected', {
        gameId: this.gameId,
        move: formatMove(move),
        code: result.code,
        reason: result.reason,
      });
      return result;
    }

    this.state = result.state;
    this.logger.debug('Move applied', {
      gameId: this.gameId,
      move: formatLegalMove(result.applied),
      status: result.state.status,
    });
    if (isTerminal(result.state.status)) {
      this.logger.info('Game over', {
        gameId: this.gameId,
        status: result.state.status,
        plies: result.state.history.length,
      });
    }
    return result;
  }

  legalMovesFor(from: Coordinate): Coordinate[] {
    return legalMovesFor(this.state, from);
  }

  render(): string[][] {
    return render(this.state);
  }

  undo(): UndoResult {
    const result = undoMove(this.state);
    if (result.ok) {
      this.state = result.state;
      this.logger.debug('Move undone', { gameId: this.gameId, move: formatMove(result.undone) });
    }
    return result;
  }

  /** How often the current position has occurred, counting this time. */
  repetitions(): number {
    return countRepetitions(this.state);
  }
}

function describeIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}
