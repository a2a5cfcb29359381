import type { ServerEnv } from '../config/env.js';
import { RoomRegistry } from './RoomRegistry.js';

export { RoomRegistry, RoomRegistryError, type PlayerConnection, type ServerRoom } from './RoomRegistry.js';

export function createRoomRegistry(env: Pick<ServerEnv, 'minPlayers' | 'maxPlayers' | 'failRevealDelayMs'>) {
  return new RoomRegistry({
    roomConfig: { minPlayers: env.minPlayers, maxPlayers: env.maxPlayers },
    failRevealDelayMs: env.failRevealDelayMs,
  });
}
