import type { RoomState } from '../types/game.js';
import type { ServerMessage } from '../types/events.js';
import type { PlayerId } from '../types/player.js';

export type Delivery =
  | { kind: 'broadcast'; message: ServerMessage; exclude: PlayerId[] }
  | { kind: 'private'; playerId: PlayerId; message: ServerMessage };

export interface EngineResult {
  state: RoomState;
  deliveries: Delivery[];
}

export function broadcast(message: ServerMessage, exclude: PlayerId[] = []): Delivery {
  return { kind: 'broadcast', message, exclude };
}

export function privately(playerId: PlayerId, message: ServerMessage): Delivery {
  return { kind: 'private', playerId, message };
}
