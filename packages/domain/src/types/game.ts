import type { Card } from './cards.js';
import type { HandPosition, Player, PlayerId, PublicPlayerView } from './player.js';

export type RoomId = string;

export type GameMode = 'simple' | 'spicy';

export const GAME_MODES: readonly GameMode[] = ['simple', 'spicy'];

export type RoomPhase = 'waiting' | 'playing' | 'finished';

export interface RoomConfig {
  minPlayers: number;
  maxPlayers: number;
}

export type MiddleVisibility = 'face-down' | 'face-up' | 'taken';

export interface MiddleSlot {
  card: Card;
  visibility: MiddleVisibility;
}

export type RevealOrigin =
  | { kind: 'middle'; slotIndex: number }
  | { kind: 'hand'; playerId: PlayerId; position: HandPosition };

export interface RevealEntry {
  card: Card;
  origin: RevealOrigin;
  /** "Middle" or the origin player's display name. */
  originLabel: string;
}

export type WinReason = '7-trio' | '3 trios' | `connected trios (${number},${number})`;

export interface RoomState {
  roomId: RoomId;
  name: string;
  mode: GameMode;
  phase: RoomPhase;
  config: RoomConfig;
  /** Join order. Seats are never removed once the game has started. */
  players: Player[];
  /** Turn rotation, fixed by a single shuffle at game start. */
  seating: PlayerId[];
  currentTurnIndex: number;
  middle: MiddleSlot[];
  revealSequence: RevealEntry[];
  winner: PlayerId | null;
  winReason: WinReason | null;
  createdAt: number;
  updatedAt: number;
}

export interface RoomSummary {
  id: RoomId;
  name: string;
  mode: GameMode;
  player_count: number;
  max_players: number;
  min_players: number;
  state: RoomPhase;
  players: PublicPlayerView[];
  current_player: string | null;
  current_player_id: PlayerId | null;
}
