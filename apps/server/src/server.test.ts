import { describe, expect, it } from 'vitest';
import { RoomRegistry } from './rooms/RoomRegistry.js';
import {
  HttpError,
  type RequestContext,
  type RequestLike,
  type ResponseLike,
  handleIncomingRequest,
  routeLabel,
  writeErrorResponse,
} from './server.js';
import { InMemoryStatsRepository } from './stats/InMemoryStatsRepository.js';
import { StatsService } from './stats/StatsService.js';

const playedAt = new Date(Date.UTC(2024, 5, 12, 10));

function createContext(): RequestContext {
  const clock = () => playedAt;
  return {
    registry: new RoomRegistry(),
    stats: new StatsService(new InMemoryStatsRepository(clock), clock),
  };
}

async function call(ctx: RequestContext, method: string, path: string, body?: unknown) {
  const res = new MockResponse();
  await handleIncomingRequest(createMockRequest(method, path, body), res, ctx);
  return res;
}

describe('http routes', () => {
  it('responds to /api/health with an ok payload and CORS headers', async () => {
    const res = await call(createContext(), 'GET', '/api/health');

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(res.headers['content-type']).toBe('application/json');
    expect(res.headers['access-control-allow-origin']).toBe('*');
  });

  it('answers preflight requests without a body', async () => {
    const res = await call(createContext(), 'OPTIONS', '/api/rooms');
    expect(res.statusCode).toBe(204);
    expect(res.body).toBe('');
  });

  it('creates, lists and looks up rooms', async () => {
    const ctx = createContext();
    const created = await call(ctx, 'POST', '/api/rooms', { name: ' Friday table ', mode: 'SPICY' });

    expect(created.statusCode).toBe(201);
    const [summary] = ctx.registry.listRooms();
    expect(created.json()).toEqual({ roomId: summary.id, room: summary });
    expect(summary).toMatchObject({ name: 'Friday table', mode: 'spicy', player_count: 0, state: 'waiting' });

    const listed = await call(ctx, 'GET', '/api/rooms');
    expect(listed.json()).toEqual({ rooms: [summary] });

    const found = await call(ctx, 'GET', `/api/rooms/${summary.id.toLowerCase()}`);
    expect(found.json()).toEqual(summary);
  });

  it('rejects bad room input', async () => {
    const ctx = createContext();
    await expect(call(ctx, 'POST', '/api/rooms', { name: 'Table', mode: 'wild' })).rejects.toMatchObject({
      status: 400,
      code: 'INVALID_INPUT',
      message: "mode must be 'simple' or 'spicy'",
    });
    await expect(call(ctx, 'POST', '/api/rooms', {})).rejects.toMatchObject({
      code: 'INVALID_INPUT',
      message: 'name must be a non-empty string',
    });
    await expect(call(ctx, 'POST', '/api/rooms', '{"name":')).rejects.toMatchObject({
      status: 400,
      code: 'INVALID_JSON',
    });
    await expect(call(ctx, 'GET', '/api/rooms/NOPE9')).rejects.toMatchObject({
      status: 404,
      code: 'ROOM_NOT_FOUND',
    });
  });

  it('manages players and matches for the statistics views', async () => {
    const ctx = createContext();
    const ann = await call(ctx, 'POST', '/api/players', { name: 'Ann' });
    await call(ctx, 'POST', '/api/players', { name: 'Ben' });

    expect(ann.statusCode).toBe(201);
    expect(ann.json()).toEqual({ id: 1, name: 'Ann', created_at: '2024-06-12T10:00:00.000Z' });

    const match = await call(ctx, 'POST', '/api/matches', { winner_id: 1, participants: [1, '2'] });
    expect(match.statusCode).toBe(201);
    expect(match.json()).toEqual({
      id: 1,
      winner_id: 1,
      participants: [1, 2],
      played_at: '2024-06-12T10:00:00.000Z',
    });

    const leaderboard = await call(ctx, 'GET', '/api/stats/leaderboard');
    expect(leaderboard.json()).toEqual({
      players: [
        { id: 1, name: 'Ann', wins: 1, matches_played: 1, win_rate: 100 },
        { id: 2, name: 'Ben', wins: 0, matches_played: 1, win_rate: 0 },
      ],
    });

    const recent = await call(ctx, 'GET', '/api/stats/recent?limit=0');
    expect(recent.json()).toEqual({
      matches: [
        {
          id: 1,
          played_at: '2024-06-12T10:00:00.000Z',
          winner_id: 1,
          winner_name: 'Ann',
          opponents: [{ id: 2, name: 'Ben' }],
        },
      ],
    });

    expect((await call(ctx, 'GET', '/api/stats/streaks')).json()).toEqual({ streaks: [] });
    expect((await call(ctx, 'GET', '/api/stats/podium')).json()).toEqual({
      podium: [
        { name: 'Ann', best_position: 1, days: 1 },
        { name: 'Ben', best_position: 2, days: 1 },
      ],
    });

    const removed = await call(ctx, 'DELETE', '/api/players/2');
    expect(removed.statusCode).toBe(204);
    expect((await call(ctx, 'GET', '/api/players')).json()).toEqual({
      players: [{ id: 1, name: 'Ann', created_at: '2024-06-12T10:00:00.000Z' }],
    });
  });

  it('surfaces statistics errors with their status', async () => {
    const ctx = createContext();
    await call(ctx, 'POST', '/api/players', { name: 'Ann' });

    await expect(call(ctx, 'POST', '/api/players', { name: 'Ann' })).rejects.toMatchObject({
      status: 409,
      code: 'PLAYER_EXISTS',
    });
    await expect(call(ctx, 'POST', '/api/matches', { winner_id: 1, participants: [1] })).rejects.toMatchObject({
      status: 400,
      message: 'At least 2 players required',
    });
    await expect(call(ctx, 'POST', '/api/matches', { winner_id: 1, participants: 'everyone' })).rejects.toMatchObject({
      code: 'INVALID_INPUT',
    });
    await expect(call(ctx, 'DELETE', '/api/players/abc')).rejects.toMatchObject({
      message: 'player id must be a positive integer',
    });
  });

  it('returns 404 for unknown routes', async () => {
    const ctx = createContext();
    const res = await call(ctx, 'GET', '/api/unknown');
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'NOT_FOUND' });
    expect((await call(ctx, 'GET', '/api/stats/everything')).statusCode).toBe(404);
  });
});

describe('writeErrorResponse', () => {
  it('maps known errors to their status and code', () => {
    const res = new MockResponse();
    expect(writeErrorResponse(res, new HttpError(400, 'INVALID_INPUT', 'bad'))).toBe(true);
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'INVALID_INPUT', message: 'bad' });
  });

  it('hides unexpected errors behind a 500', () => {
    const res = new MockResponse();
    expect(writeErrorResponse(res, new Error('database exploded'))).toBe(false);
    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'INTERNAL_ERROR' });
  });
});

describe('routeLabel', () => {
  it('collapses path parameters', () => {
    expect(routeLabel('/api/rooms/ABC12')).toBe('/api/rooms/:code');
    expect(routeLabel('/api/players/7')).toBe('/api/players/:id');
    expect(routeLabel('/api/stats/weekly')).toBe('/api/stats/weekly');
  });
});

function createMockRequest(method: string, path: string, body?: unknown): RequestLike {
  const chunks =
    body === undefined ? [] : [Buffer.from(typeof body === 'string' ? body : JSON.stringify(body), 'utf8')];
  return {
    method,
    url: path,
    headers: { host: 'test.local' },
    async *[Symbol.asyncIterator]() {
      yield* chunks;
    },
  };
}

class MockResponse implements ResponseLike {
  statusCode = 0;
  headers: Record<string, string> = {};
  body = '';

  setHeader(name: string, value: string) {
    this.headers[name.toLowerCase()] = value;
  }

  end(body?: string) {
    this.body = body ?? '';
  }

  json(): unknown {
    return JSON.parse(this.body);
  }
}
