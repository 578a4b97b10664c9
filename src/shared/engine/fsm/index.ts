/**
 * FSM Module - game status transitions
 */

export {
  transition,
  isTerminal,
  sideToMove,
  statusForPosition,
  type GameStatus,
  type ToMoveStatus,
  type CheckStatus,
  type CheckmateStatus,
  type StalemateStatus,
  type StatusEvent,
  type StatusTransitionResult,
  type StatusTransitionError,
} from './GameStatusMachine';
