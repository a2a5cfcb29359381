import type { RoomState } from '../types/game.js';
import type { Player, PlayerId } from '../types/player.js';
import { EngineError, assertEngine } from './errors.js';

export function findPlayer(state: RoomState, playerId: PlayerId): Player | undefined {
  return state.players.find((player) => player.id === playerId);
}

export function requirePlayer(state: RoomState, playerId: PlayerId): Player {
  const player = findPlayer(state, playerId);
  if (!player) {
    throw new EngineError('PLAYER_NOT_FOUND', 'Player not found');
  }
  return player;
}

export function getCurrentPlayerId(state: RoomState): PlayerId | null {
  if (state.phase !== 'playing' || state.seating.length === 0) {
    return null;
  }
  return state.seating[state.currentTurnIndex % state.seating.length] ?? null;
}

export function getCurrentPlayer(state: RoomState): Player | null {
  const playerId = getCurrentPlayerId(state);
  return playerId ? findPlayer(state, playerId) ?? null : null;
}

export function isPlayersTurn(state: RoomState, playerId: PlayerId): boolean {
  return getCurrentPlayerId(state) === playerId;
}

export function isRoomFull(state: RoomState): boolean {
  return state.players.length >= state.config.maxPlayers;
}

export function requireWaiting(state: RoomState, action: string): void {
  assertEngine(state.phase === 'waiting', 'GAME_NOT_WAITING', `Cannot ${action} once the game has started`);
}

/** Guards shared by both reveal operations. */
export function requireActiveTurn(state: RoomState, playerId: PlayerId): Player {
  assertEngine(state.phase === 'playing', 'GAME_NOT_PLAYING', 'The game is not in progress');
  assertEngine(isPlayersTurn(state, playerId), 'NOT_YOUR_TURN', "It's not your turn!");
  return requirePlayer(state, playerId);
}

/** Cards dealt into the game: hands, trios, middle slots not yet taken, and hand cards out in the reveal sequence. */
export function countCardsInPlay(state: RoomState): number {
  const inHands = state.players.reduce((sum, player) => sum + player.hand.length, 0);
  const inTrios = state.players.reduce((sum, player) => sum + player.trios.length * 3, 0);
  const inMiddle = state.middle.filter((slot) => slot.visibility !== 'taken').length;
  const outFromHands = state.revealSequence.filter((entry) => entry.origin.kind === 'hand').length;
  return inHands + inTrios + inMiddle + outFromHands;
}
