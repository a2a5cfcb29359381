import type { GameMode, RoomConfig, RoomId, RoomState } from '../types/game.js';
import type { Player, PlayerId } from '../types/player.js';
import { EngineError, assertEngine } from './errors.js';
import { type EngineResult, broadcast, privately } from './events.js';
import { MAX_SEATS, MIN_SEATS } from './deck.js';
import { buildRoomSummary, toPublicPlayer } from './views.js';
import { findPlayer, isRoomFull, requireWaiting } from './validation.js';

export const DEFAULT_ROOM_CONFIG: RoomConfig = {
  minPlayers: MIN_SEATS,
  maxPlayers: MAX_SEATS,
};

export interface CreateRoomStateOptions {
  roomId: RoomId;
  name: string;
  mode?: GameMode;
  config?: Partial<RoomConfig>;
  createdAt?: number;
}

/** Keeps both limits inside the seat counts that can be dealt. */
export function resolveRoomConfig(config: Partial<RoomConfig> = {}): RoomConfig {
  const minPlayers = clampSeats(config.minPlayers ?? DEFAULT_ROOM_CONFIG.minPlayers, MIN_SEATS);
  const maxPlayers = clampSeats(config.maxPlayers ?? DEFAULT_ROOM_CONFIG.maxPlayers, minPlayers);
  return { minPlayers, maxPlayers };
}

function clampSeats(value: number, floor: number): number {
  return Math.min(MAX_SEATS, Math.max(floor, value));
}

export function createRoomState(options: CreateRoomStateOptions): RoomState {
  const now = Date.now();
  return {
    roomId: options.roomId,
    name: options.name,
    mode: options.mode ?? 'simple',
    phase: 'waiting',
    config: resolveRoomConfig(options.config),
    players: [],
    seating: [],
    currentTurnIndex: 0,
    middle: [],
    revealSequence: [],
    winner: null,
    winReason: null,
    createdAt: options.createdAt ?? now,
    updatedAt: now,
  };
}

export interface NewSeat {
  id: PlayerId;
  name: string;
}

export function addPlayer(state: RoomState, seat: NewSeat): EngineResult {
  assertEngine(!isRoomFull(state), 'ROOM_FULL', 'Room is full');
  requireWaiting(state, 'join');
  assertEngine(!findPlayer(state, seat.id), 'INVALID_PAYLOAD', 'Player is already seated');

  const player: Player = {
    id: seat.id,
    name: seat.name,
    hand: [],
    trios: [],
    connected: true,
  };
  const next: RoomState = {
    ...state,
    players: [...state.players, player],
    updatedAt: Date.now(),
  };
  const room = buildRoomSummary(next);

  return {
    state: next,
    deliveries: [
      broadcast({ type: 'player_joined', player: toPublicPlayer(player), room }, [player.id]),
      privately(player.id, { type: 'welcome', player_id: player.id, room }),
    ],
  };
}

/**
 * While waiting the seat is dropped entirely. Once the game has started the
 * seat, hand and rotation stay; only the connectivity flag flips.
 */
export function removePlayer(state: RoomState, playerId: PlayerId): EngineResult {
  const player = findPlayer(state, playerId);
  if (!player) {
    throw new EngineError('PLAYER_NOT_FOUND', 'Player not found');
  }

  const next: RoomState =
    state.phase === 'waiting'
      ? { ...state, players: state.players.filter((entry) => entry.id !== playerId), updatedAt: Date.now() }
      : setPlayerConnected(state, playerId, false);

  return {
    state: next,
    deliveries: [
      broadcast(
        {
          type: 'player_disconnected',
          player_id: playerId,
          player_name: player.name,
          room: buildRoomSummary(next),
        },
        [playerId],
      ),
    ],
  };
}

export function setPlayerConnected(state: RoomState, playerId: PlayerId, connected: boolean): RoomState {
  const player = findPlayer(state, playerId);
  if (!player || player.connected === connected) {
    return state;
  }
  return {
    ...state,
    players: state.players.map((entry) => (entry.id === playerId ? { ...entry, connected } : entry)),
    updatedAt: Date.now(),
  };
}

export function setMode(state: RoomState, playerId: PlayerId, mode: GameMode): EngineResult {
  requireWaiting(state, 'change the mode');
  assertEngine(Boolean(findPlayer(state, playerId)), 'PLAYER_NOT_FOUND', 'Player not found');

  const next: RoomState = { ...state, mode, updatedAt: Date.now() };
  return {
    state: next,
    deliveries: [broadcast({ type: 'mode_changed', mode, room: buildRoomSummary(next) })],
  };
}

export function isRoomAbandoned(state: RoomState): boolean {
  return state.phase === 'waiting' && state.players.length === 0;
}
