import { describe, expect, it } from 'vitest';
import { setTimeout as delay } from 'node:timers/promises';
import { FakeConnection } from '../testing/FakeConnection.js';
import { RoomRegistry, RoomRegistryError, type RoomRegistryOptions } from './RoomRegistry.js';

interface Seat {
  id: string;
  connection: FakeConnection;
}

async function seat(registry: RoomRegistry, code: string, name: string): Promise<Seat> {
  const connection = new FakeConnection();
  const { playerId } = await registry.join(code, name, connection);
  return { id: playerId, connection };
}

async function lobby(options: RoomRegistryOptions = {}) {
  const registry = new RoomRegistry({ randomInt: () => 0, failRevealDelayMs: 0, ...options });
  const room = registry.createRoom({ name: 'Friday table' });
  const ann = await seat(registry, room.code, 'Ann');
  const ben = await seat(registry, room.code, 'Ben');
  const cat = await seat(registry, room.code, 'Cat');
  return { registry, room, ann, ben, cat };
}

/**
 * With a zero random source the seating becomes Ben, Cat, Ann and the deck is
 * rotated by one card: Ben holds ids 1-9 (1,1,2,2,2,3,3,3,4), Cat ids 10-18
 * (4,4,5,5,5,6,6,6,7), Ann ids 19-27 (7,7,8,8,8,9,9,9,10) and the middle
 * holds ids 28-35 then 0.
 */
async function startedTable(options: RoomRegistryOptions = {}) {
  const table = await lobby(options);
  await table.registry.dispatch(table.ann.id, { action: 'start_game' });
  for (const { connection } of [table.ann, table.ben, table.cat]) {
    connection.clear();
  }
  return table;
}

describe('RoomRegistry rooms', () => {
  it('creates rooms with five character codes and looks them up case-insensitively', () => {
    const registry = new RoomRegistry();
    const room = registry.createRoom({ name: 'Friday table', mode: 'spicy' });

    expect(room.code).toMatch(/^[A-Z0-9]{5}$/);
    expect(room.state.mode).toBe('spicy');
    expect(registry.getRoom(room.code.toLowerCase())).toBe(room);
  });

  it('lists only waiting rooms with free seats', async () => {
    const registry = new RoomRegistry({ roomConfig: { maxPlayers: 4 } });
    const open = registry.createRoom({ name: 'Open' });
    const started = registry.createRoom({ name: 'Started' });
    const full = registry.createRoom({ name: 'Full' });

    await seat(registry, open.code, 'Ann');
    const host = await seat(registry, started.code, 'Ben');
    await seat(registry, started.code, 'Cat');
    await seat(registry, started.code, 'Gus');
    await registry.dispatch(host.id, { action: 'start_game' });
    for (const name of ['Dan', 'Eve', 'Fay', 'Hal']) {
      await seat(registry, full.code, name);
    }

    const listed = registry.listRooms();
    expect(listed.map((room) => room.id)).toEqual([open.code]);
    expect(listed[0]).toMatchObject({ name: 'Open', player_count: 1, max_players: 4, state: 'waiting' });
  });
});

describe('RoomRegistry join and leave', () => {
  it('welcomes the joiner and announces them to everyone else', async () => {
    const { room, ann, ben, cat } = await lobby();

    expect(ann.connection.types()).toEqual(['welcome', 'player_joined', 'player_joined']);
    expect(ben.connection.types()).toEqual(['welcome', 'player_joined']);
    expect(cat.connection.types()).toEqual(['welcome']);

    expect(cat.connection.last('welcome')).toMatchObject({ player_id: cat.id, room: { player_count: 3 } });
    expect(ann.connection.last('player_joined')?.player).toMatchObject({ id: cat.id, name: 'Cat' });
    expect(ann.id).toMatch(/^[a-z0-9]{8}$/);
    expect(room.state.players.map((player) => player.name)).toEqual(['Ann', 'Ben', 'Cat']);
  });

  it('rejects unknown rooms, full rooms and started games without adding a seat', async () => {
    const registry = new RoomRegistry({ roomConfig: { maxPlayers: 3 } });
    await expect(registry.join('ZZZZZ', 'Ann', new FakeConnection())).rejects.toMatchObject({
      code: 'ROOM_NOT_FOUND',
      status: 404,
    });

    const { registry: fullRegistry, room } = await lobby({ roomConfig: { maxPlayers: 3 } });
    await expect(fullRegistry.join(room.code, 'Dan', new FakeConnection())).rejects.toMatchObject({
      code: 'ROOM_FULL',
      message: 'Room is full',
    });
    expect(room.state.players).toHaveLength(3);

    const table = await startedTable();
    const late = table.registry.join(table.room.code, 'Dan', new FakeConnection());
    await expect(late).rejects.toBeInstanceOf(RoomRegistryError);
    await expect(late).rejects.toMatchObject({ code: 'GAME_NOT_WAITING' });
    expect(table.room.state.players).toHaveLength(3);
  });

  it('requires a display name', async () => {
    const registry = new RoomRegistry();
    const room = registry.createRoom({ name: 'Friday table' });
    await expect(registry.join(room.code, '   ', new FakeConnection())).rejects.toMatchObject({
      code: 'INVALID_NAME',
    });
  });

  it('drops the seat while waiting and closes the room once empty', async () => {
    const { registry, room, ann, ben, cat } = await lobby();

    await registry.leave(ben.id);
    expect(room.state.players.map((player) => player.name)).toEqual(['Ann', 'Cat']);
    expect(ann.connection.last('player_disconnected')).toMatchObject({ player_id: ben.id, player_name: 'Ben' });
    expect(ben.connection.types()).not.toContain('player_disconnected');

    await registry.leave(ann.id);
    await registry.leave(cat.id);
    expect(registry.getRoom(room.code)).toBeUndefined();
    expect(registry.listRooms()).toEqual([]);
  });

  it('keeps the seat of a player who leaves mid-game', async () => {
    const { registry, room, ann, cat } = await startedTable();

    await registry.leave(cat.id);
    const seatState = room.state.players.find((player) => player.id === cat.id);
    expect(seatState?.connected).toBe(false);
    expect(seatState?.hand).toHaveLength(9);
    expect(room.state.seating).toHaveLength(3);
    expect(ann.connection.types()).toEqual(['player_disconnected']);
    expect(registry.getRoom(room.code)).toBe(room);
  });
});

describe('RoomRegistry dispatch', () => {
  it('deals and hands the first turn to the first seat', async () => {
    const { registry, ann, ben } = await lobby();
    ann.connection.clear();
    ben.connection.clear();

    await registry.dispatch(ann.id, { action: 'start_game' });

    expect(ann.connection.types()).toEqual(['game_started', 'your_hand', 'game_state']);
    expect(ben.connection.types()).toEqual(['game_started', 'your_hand', 'your_turn', 'game_state']);
    expect(ben.connection.last('your_hand')?.hand).toMatchObject({ lowest: 1, highest: 4 });
    expect(ann.connection.last('game_started')?.turn_order).toEqual(['Ben', 'Cat', 'Ann']);
  });

  it('answers a malformed payload with one private error and no mutation', async () => {
    const { registry, room, ann, ben } = await startedTable();
    const before = room.state;

    await registry.dispatch(ben.id, { action: 'reveal_middle' });
    await registry.dispatch(ben.id, { action: 'dance' });

    expect(ben.connection.received).toEqual([
      { type: 'error', code: 'INVALID_PAYLOAD', message: 'card_id must be an integer' },
      { type: 'error', code: 'INVALID_PAYLOAD', message: "Unknown action 'dance'" },
    ]);
    expect(ann.connection.received).toEqual([]);
    expect(room.state).toBe(before);
  });

  it('reports engine rejections privately', async () => {
    const { registry, room, ann, ben } = await startedTable();
    const before = room.state;

    await registry.dispatch(ann.id, { action: 'reveal_middle', card_id: 28 });

    expect(ann.connection.received).toEqual([{ type: 'error', code: 'NOT_YOUR_TURN', message: "It's not your turn!" }]);
    expect(ben.connection.received).toEqual([]);
    expect(room.state).toBe(before);
  });

  it('broadcasts mode changes and chat', async () => {
    const { registry, room, ann, ben, cat } = await lobby();
    for (const { connection } of [ann, ben, cat]) {
      connection.clear();
    }

    await registry.dispatch(ben.id, { action: 'set_mode', mode: 'SPICY' });
    await registry.dispatch(cat.id, { action: 'chat', message: 'ready?' });

    expect(room.state.mode).toBe('spicy');
    for (const { connection } of [ann, ben, cat]) {
      expect(connection.types()).toEqual(['mode_changed', 'chat']);
      expect(connection.last('chat')).toEqual({ type: 'chat', player: 'Cat', player_id: cat.id, message: 'ready?' });
    }
  });

  it('keeps the turn after a trio', async () => {
    const { registry, room, ben, cat } = await startedTable();

    await registry.dispatch(ben.id, { action: 'reveal_player', target_player_id: ben.id, position: 'lowest' });
    await registry.dispatch(ben.id, { action: 'reveal_player', target_player_id: ben.id, position: 'lowest' });
    await registry.dispatch(ben.id, { action: 'reveal_middle', card_id: 0 });

    const benSeat = room.state.players.find((player) => player.id === ben.id);
    expect(benSeat?.trios.map((trio) => trio.map((card) => card.number))).toEqual([[1, 1, 1]]);
    expect(room.state.middle.find((slot) => slot.card.id === 0)?.visibility).toBe('taken');
    expect(ben.connection.last('your_turn')?.message).toBe('Great trio! Continue your turn - find another!');
    expect(cat.connection.last('trio_complete')?.message).toBe('Ben got a trio of 1s!');
    expect(room.state.seating[room.state.currentTurnIndex]).toBe(ben.id);
  });

  it('applies an action sent during the fail delay only after the turn has passed', async () => {
    const { registry, room, ben, cat } = await startedTable({ failRevealDelayMs: 40 });

    await registry.dispatch(ben.id, { action: 'reveal_middle', card_id: 28 });
    const failing = registry.dispatch(ben.id, { action: 'reveal_middle', card_id: 30 });
    await delay(5);
    const interleaved = registry.dispatch(cat.id, { action: 'reveal_middle', card_id: 28 });
    await Promise.all([failing, interleaved]);

    const types = cat.connection.types();
    expect(types).not.toContain('error');
    const turnChanged = types.indexOf('turn_changed');
    const lastReveal = types.lastIndexOf('card_revealed');
    expect(turnChanged).toBeGreaterThan(types.indexOf('turn_failed'));
    expect(lastReveal).toBeGreaterThan(turnChanged);
    expect(cat.connection.last('card_revealed')).toMatchObject({ card: { id: 28, number: 10 }, revealed_by: 'Cat' });
    expect(room.state.revealSequence.map((entry) => entry.card.id)).toEqual([28]);
  });

  it('ends the game on three sevens and keeps the finished room after everyone leaves', async () => {
    const { registry, room, ann, ben, cat } = await startedTable();

    await registry.dispatch(ben.id, { action: 'reveal_player', target_player_id: cat.id, position: 'highest' });
    await registry.dispatch(ben.id, { action: 'reveal_player', target_player_id: ann.id, position: 'lowest' });
    await registry.dispatch(ben.id, { action: 'reveal_player', target_player_id: ann.id, position: 'lowest' });

    expect(room.state.phase).toBe('finished');
    expect(ann.connection.last('game_over')).toMatchObject({
      winner: 'Ben',
      winner_id: ben.id,
      reason: '7-trio',
      message: 'Ben wins! Got the legendary 7-7-7 trio!',
    });

    await registry.dispatch(ben.id, { action: 'reveal_middle', card_id: 28 });
    expect(ben.connection.last('error')?.code).toBe('GAME_NOT_PLAYING');

    for (const { id } of [ann, ben, cat]) {
      await registry.leave(id);
    }
    expect(registry.getRoom(room.code)).toBe(room);
    expect(room.state.phase).toBe('finished');
    expect(room.state.players.map((player) => player.connected)).toEqual([false, false, false]);
  });
});

describe('RoomRegistry delivery', () => {
  it('marks a seat disconnected when its send fails and still reaches the others', async () => {
    const { registry, room, ann, ben, cat } = await startedTable();
    cat.connection.failing = true;

    await registry.dispatch(ann.id, { action: 'chat', message: 'hi' });
    cat.connection.failing = false;
    await registry.dispatch(ann.id, { action: 'chat', message: 'still there?' });

    expect(ann.connection.all('chat').map((message) => message.message)).toEqual(['hi', 'still there?']);
    expect(ben.connection.all('chat').map((message) => message.message)).toEqual(['hi', 'still there?']);
    expect(cat.connection.received).toEqual([]);
    expect(room.state.players.find((player) => player.id === cat.id)?.connected).toBe(false);
  });

  it('drops private messages for disconnected seats', async () => {
    const { registry, room, cat } = await startedTable();
    await registry.leave(cat.id);
    cat.connection.clear();

    registry.sendTo(room, cat.id, { type: 'your_turn', message: 'nobody hears this' });
    expect(cat.connection.received).toEqual([]);
  });
});
