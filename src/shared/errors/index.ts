/**
 * Shared Errors Module
 */

export {
  GameErrorCode,
  GameError,
  InvalidMovePayloadError,
  ConfigurationError,
  isGameError,
  isInvalidMovePayloadError,
  type GameErrorJSON,
} from './GameDomainErrors';
