export type EngineErrorCode =
  | 'INVALID_PAYLOAD'
  | 'GAME_NOT_WAITING'
  | 'GAME_NOT_PLAYING'
  | 'NOT_YOUR_TURN'
  | 'CARD_NOT_FOUND'
  | 'CARD_ALREADY_FACE_UP'
  | 'PLAYER_NOT_FOUND'
  | 'NO_CARDS'
  | 'INVALID_POSITION'
  | 'ROOM_FULL'
  | 'NOT_ENOUGH_PLAYERS';

export type EngineErrorKind = 'validation' | 'phase' | 'turn' | 'target' | 'capacity';

export const ENGINE_ERROR_KINDS: Record<EngineErrorCode, EngineErrorKind> = {
  INVALID_PAYLOAD: 'validation',
  GAME_NOT_WAITING: 'phase',
  GAME_NOT_PLAYING: 'phase',
  NOT_YOUR_TURN: 'turn',
  CARD_NOT_FOUND: 'target',
  CARD_ALREADY_FACE_UP: 'target',
  PLAYER_NOT_FOUND: 'target',
  NO_CARDS: 'target',
  INVALID_POSITION: 'target',
  ROOM_FULL: 'capacity',
  NOT_ENOUGH_PLAYERS: 'capacity',
};

export class EngineError extends Error {
  constructor(public readonly code: EngineErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
  }

  get kind(): EngineErrorKind {
    return ENGINE_ERROR_KINDS[this.code];
  }
}

export function assertEngine(condition: boolean, code: EngineErrorCode, message: string): asserts condition {
  if (!condition) {
    throw new EngineError(code, message);
  }
}
