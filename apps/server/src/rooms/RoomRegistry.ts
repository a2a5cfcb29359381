import { setTimeout as delay } from 'node:timers/promises';
import {
  type Delivery,
  type EngineResult,
  EngineError,
  type GameMode,
  type PlayerId,
  type RandomInt,
  type RevealResult,
  type RoomConfig,
  type RoomId,
  type RoomState,
  type RoomSummary,
  type ServerMessage,
  addPlayer,
  buildRoomSummary,
  createRoomState,
  defaultRandomInt,
  findPlayer,
  isRoomAbandoned,
  isRoomFull,
  removePlayer,
  resolveFailedTurn,
  revealFromMiddle,
  revealFromPlayer,
  setMode,
  setPlayerConnected,
  startGame,
} from '@trio/domain';
import { logger } from '../observability/logger.js';
import {
  trackGameCompleted,
  trackGameStarted,
  trackRoomClosed,
  trackRoomCreated,
  trackTrioCaptured,
  trackTurnFailed,
} from '../observability/metrics.js';
import { type ClientAction, parseClientAction } from './actions.js';
import { RoomActionQueue } from './RoomActionQueue.js';

export const DEFAULT_FAIL_REVEAL_DELAY_MS = 2500;
const ROOM_CODE_LENGTH = 5;
const ROOM_CODE_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const PLAYER_ID_LENGTH = 8;
const PLAYER_ID_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789';
const ID_ATTEMPTS = 20;
export const MAX_NAME_LENGTH = 32;

/** Outbound side of one seated player's transport. `send` throws when the transport is gone. */
export interface PlayerConnection {
  send(message: ServerMessage): void;
}

export interface ServerRoom {
  code: RoomId;
  state: RoomState;
  connections: Map<PlayerId, PlayerConnection>;
}

export interface RoomRegistryOptions {
  roomConfig?: Partial<RoomConfig>;
  failRevealDelayMs?: number;
  /** Drives seating and deck shuffles. */
  randomInt?: RandomInt;
}

export interface CreateRoomOptions {
  name: string;
  mode?: GameMode;
}

export interface JoinRoomResult {
  room: ServerRoom;
  playerId: PlayerId;
}

export type RoomRegistryErrorCode =
  | 'ROOM_NOT_FOUND'
  | 'ROOM_FULL'
  | 'GAME_NOT_WAITING'
  | 'INVALID_NAME'
  | 'ROOM_CODE_EXHAUSTED';

export class RoomRegistryError extends Error {
  constructor(
    public readonly code: RoomRegistryErrorCode,
    message: string,
    public readonly status: number = 400,
  ) {
    super(message);
    this.name = 'RoomRegistryError';
  }
}

export class RoomRegistry {
  private readonly roomsByCode = new Map<RoomId, ServerRoom>();
  private readonly playerRooms = new Map<PlayerId, RoomId>();
  private readonly queue = new RoomActionQueue();
  private readonly roomConfig?: Partial<RoomConfig>;
  private readonly failRevealDelayMs: number;
  private readonly randomInt: RandomInt;
  private readonly log = logger.child({ context: { component: 'room-registry' } });

  constructor(options: RoomRegistryOptions = {}) {
    this.roomConfig = options.roomConfig;
    this.failRevealDelayMs = options.failRevealDelayMs ?? DEFAULT_FAIL_REVEAL_DELAY_MS;
    this.randomInt = options.randomInt ?? defaultRandomInt;
  }

  createRoom(options: CreateRoomOptions): ServerRoom {
    const code = this.generateRoomCode();
    const state = createRoomState({
      roomId: code,
      name: options.name,
      mode: options.mode,
      config: this.roomConfig,
    });
    const room: ServerRoom = { code, state, connections: new Map() };
    this.roomsByCode.set(code, room);

    trackRoomCreated({ mode: state.mode });
    this.log.info('room created', {
      roomId: code,
      mode: state.mode,
      context: { name: state.name, ...state.config },
    });
    return room;
  }

  getRoom(code: string): ServerRoom | undefined {
    return this.roomsByCode.get(normalizeRoomCode(code));
  }

  getPlayerRoom(playerId: PlayerId): ServerRoom | undefined {
    const code = this.playerRooms.get(playerId);
    return code ? this.roomsByCode.get(code) : undefined;
  }

  /** Rooms still open to new seats. */
  listRooms(): RoomSummary[] {
    return Array.from(this.roomsByCode.values())
      .filter((room) => room.state.phase === 'waiting' && !isRoomFull(room.state))
      .map((room) => buildRoomSummary(room.state));
  }

  async join(code: string, name: string, connection: PlayerConnection): Promise<JoinRoomResult> {
    const displayName = name.trim().slice(0, MAX_NAME_LENGTH);
    if (!displayName) {
      throw new RoomRegistryError('INVALID_NAME', 'Name is required');
    }
    const roomCode = this.requireRoom(code).code;

    return this.queue.run(roomCode, () => {
      // Re-read: the room can close while this join waits its turn.
      const room = this.requireRoom(roomCode);
      const playerId = this.createPlayerId();

      let result: EngineResult;
      try {
        result = addPlayer(room.state, { id: playerId, name: displayName });
      } catch (error) {
        throw toJoinError(error);
      }

      room.connections.set(playerId, connection);
      this.playerRooms.set(playerId, room.code);
      this.commit(room, result);

      this.log.info('player joined', {
        roomId: room.code,
        playerId,
        context: { name: displayName, seats: room.state.players.length },
      });
      return { room, playerId };
    });
  }

  async leave(playerId: PlayerId): Promise<void> {
    const code = this.playerRooms.get(playerId);
    if (!code) {
      return;
    }

    await this.queue.run(code, () => {
      this.playerRooms.delete(playerId);
      const room = this.roomsByCode.get(code);
      if (!room) {
        return;
      }
      room.connections.delete(playerId);
      if (!findPlayer(room.state, playerId)) {
        return;
      }

      this.commit(room, removePlayer(room.state, playerId));
      this.log.info('player left', {
        roomId: code,
        playerId,
        phase: room.state.phase,
      });
      this.closeIfIdle(room);
    });
  }

  /**
   * Validates and applies one inbound action. Rejections go back to the sender
   * only. A failed reveal holds the room's queue for the whole fail delay.
   */
  async dispatch(playerId: PlayerId, payload: unknown): Promise<void> {
    const code = this.playerRooms.get(playerId);
    if (!code) {
      this.log.debug('dropping action from unseated player', { playerId });
      return;
    }

    await this.queue.run(code, async () => {
      const room = this.roomsByCode.get(code);
      if (!room) {
        return;
      }

      const parsed = parseClientAction(payload);
      if (!parsed.ok) {
        this.sendTo(room, playerId, { type: 'error', code: 'INVALID_PAYLOAD', message: parsed.message });
        return;
      }

      try {
        await this.apply(room, playerId, parsed.value);
      } catch (error) {
        this.reportActionError(room, playerId, parsed.value, error);
      }
    });
  }

  /** Sends to every connected seat not in `exclude`. A failed send only degrades that seat. */
  broadcast(room: ServerRoom, message: ServerMessage, exclude: Iterable<PlayerId> = []) {
    const excluded = new Set(exclude);
    for (const player of room.state.players) {
      if (excluded.has(player.id) || !player.connected) {
        continue;
      }
      this.deliverTo(room, player.id, message);
    }
  }

  /** Dropped silently when the seat is disconnected. */
  sendTo(room: ServerRoom, playerId: PlayerId, message: ServerMessage) {
    const player = findPlayer(room.state, playerId);
    if (!player?.connected) {
      return;
    }
    this.deliverTo(room, playerId, message);
  }

  private async apply(room: ServerRoom, playerId: PlayerId, action: ClientAction): Promise<void> {
    switch (action.action) {
      case 'set_mode':
        this.commit(room, setMode(room.state, playerId, action.mode));
        return;
      case 'start_game':
        this.commit(room, startGame(room.state, playerId, this.randomInt));
        trackGameStarted({ mode: room.state.mode, players: room.state.players.length });
        this.log.info('game started', {
          roomId: room.code,
          playerId,
          mode: room.state.mode,
          context: { seating: room.state.seating },
        });
        return;
      case 'reveal_middle':
        await this.settleReveal(room, revealFromMiddle(room.state, playerId, action.cardId));
        return;
      case 'reveal_player':
        await this.settleReveal(
          room,
          revealFromPlayer(room.state, playerId, action.targetPlayerId, action.position),
        );
        return;
      case 'chat': {
        const player = findPlayer(room.state, playerId);
        if (player) {
          this.broadcast(room, { type: 'chat', player: player.name, player_id: player.id, message: action.message });
        }
        return;
      }
    }
  }

  private async settleReveal(room: ServerRoom, result: RevealResult): Promise<void> {
    const actorId = result.state.seating[result.state.currentTurnIndex];
    this.commit(room, result);

    switch (result.outcome) {
      case 'trio':
        trackTrioCaptured({ mode: room.state.mode });
        this.log.info('trio captured', { roomId: room.code, playerId: actorId, mode: room.state.mode });
        if (result.finished && room.state.winReason) {
          trackGameCompleted({ mode: room.state.mode, reason: room.state.winReason });
          this.log.info('game finished', {
            roomId: room.code,
            playerId: room.state.winner,
            context: { reason: room.state.winReason },
          });
        }
        return;
      case 'fail':
        trackTurnFailed({ mode: room.state.mode });
        this.log.debug('turn failed', { roomId: room.code, playerId: actorId });
        await delay(this.failRevealDelayMs);
        this.commit(room, resolveFailedTurn(room.state));
        return;
      case 'pending':
      case 'continue':
        return;
    }
  }

  private commit(room: ServerRoom, result: EngineResult) {
    room.state = result.state;
    this.deliver(room, result.deliveries);
  }

  private deliver(room: ServerRoom, deliveries: Delivery[]) {
    for (const delivery of deliveries) {
      switch (delivery.kind) {
        case 'broadcast':
          this.broadcast(room, delivery.message, delivery.exclude);
          break;
        case 'private':
          this.sendTo(room, delivery.playerId, delivery.message);
          break;
      }
    }
  }

  private deliverTo(room: ServerRoom, playerId: PlayerId, message: ServerMessage) {
    const connection = room.connections.get(playerId);
    try {
      if (!connection) {
        throw new Error('No connection for seat');
      }
      connection.send(message);
    } catch (error) {
      this.log.warn('delivery failed, marking seat disconnected', {
        roomId: room.code,
        playerId,
        error,
        context: { messageType: message.type },
      });
      room.connections.delete(playerId);
      room.state = setPlayerConnected(room.state, playerId, false);
    }
  }

  private reportActionError(room: ServerRoom, playerId: PlayerId, action: ClientAction, error: unknown) {
    if (error instanceof EngineError) {
      this.log.debug('action rejected', {
        roomId: room.code,
        playerId,
        context: { action: action.action, code: error.code, kind: error.kind },
      });
      this.sendTo(room, playerId, { type: 'error', code: error.code, message: error.message });
      return;
    }

    this.log.error('action failed', {
      roomId: room.code,
      playerId,
      error,
      context: { action: action.action },
    });
    this.sendTo(room, playerId, { type: 'error', code: 'ACTION_FAILED', message: 'Action failed' });
  }

  /** Only an empty lobby is dropped. */
  private closeIfIdle(room: ServerRoom) {
    if (!isRoomAbandoned(room.state)) {
      return;
    }

    this.roomsByCode.delete(room.code);
    for (const player of room.state.players) {
      this.playerRooms.delete(player.id);
    }
    trackRoomClosed();
    this.log.info('room closed', { roomId: room.code, phase: room.state.phase });
  }

  private requireRoom(code: string): ServerRoom {
    const room = this.getRoom(code);
    if (!room) {
      throw new RoomRegistryError('ROOM_NOT_FOUND', 'Room not found', 404);
    }
    return room;
  }

  private generateRoomCode(): RoomId {
    for (let attempt = 0; attempt < ID_ATTEMPTS; attempt += 1) {
      const candidate = randomString(ROOM_CODE_CHARS, ROOM_CODE_LENGTH);
      if (!this.roomsByCode.has(candidate)) {
        return candidate;
      }
    }
    throw new RoomRegistryError('ROOM_CODE_EXHAUSTED', 'Unable to allocate a room code', 503);
  }

  private createPlayerId(): PlayerId {
    for (let attempt = 0; attempt < ID_ATTEMPTS; attempt += 1) {
      const candidate = randomString(PLAYER_ID_CHARS, PLAYER_ID_LENGTH);
      if (!this.playerRooms.has(candidate)) {
        return candidate;
      }
    }
    throw new Error('Unable to allocate a player id');
  }
}

export function normalizeRoomCode(code: string): RoomId {
  return code.trim().toUpperCase();
}

function randomString(alphabet: string, length: number): string {
  return Array.from({ length }, () => alphabet[defaultRandomInt(alphabet.length)]).join('');
}

function toJoinError(error: unknown): unknown {
  if (error instanceof EngineError) {
    switch (error.code) {
      case 'ROOM_FULL':
        return new RoomRegistryError('ROOM_FULL', 'Room is full', 409);
      case 'GAME_NOT_WAITING':
        return new RoomRegistryError('GAME_NOT_WAITING', 'Game already in progress', 409);
      default:
        break;
    }
  }
  return error;
}
