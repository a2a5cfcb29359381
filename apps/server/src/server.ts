import http, { type IncomingHttpHeaders } from "node:http";
import { URL } from "node:url";
import { context as otelContext, SpanStatusCode, trace } from "@opentelemetry/api";
import { buildRoomSummary } from "@trio/domain";
import { RoomRegistry, RoomRegistryError } from "./rooms/RoomRegistry.js";
import { isRecord, parseGameMode } from "./rooms/actions.js";
import { StatsError, StatsService } from "./stats/StatsService.js";
import { InMemoryStatsRepository } from "./stats/InMemoryStatsRepository.js";
import { DEFAULT_RECENT_LIMIT } from "./stats/leaderboard.js";
import { getTracer, getMetricsHandler } from "./observability/telemetry.js";
import { recordHttpRequest } from "./observability/metrics.js";
import { logger } from "./observability/logger.js";

export interface RequestContext {
  registry: RoomRegistry;
  stats: StatsService;
}

/** The parts of `IncomingMessage` the router reads. */
export interface RequestLike extends AsyncIterable<Buffer | string> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

/** The parts of `ServerResponse` the router writes. */
export interface ResponseLike {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body?: string): unknown;
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface CreateServerOptions {
  context?: Partial<RequestContext>;
}

const MAX_ROOM_NAME_LENGTH = 64;
const MAX_RECENT_LIMIT = 100;

const tracer = getTracer();
const metricsHandler = getMetricsHandler();
const httpLogger = logger.child({ context: { component: "http-server" } });

export function createAppServer(options: CreateServerOptions = {}) {
  const ctx: RequestContext = {
    registry: options.context?.registry ?? new RoomRegistry(),
    stats: options.context?.stats ?? new StatsService(new InMemoryStatsRepository()),
  };

  return http.createServer(async (req, res) => {
    const startAt = process.hrtime.bigint();
    const method = req.method ?? "GET";
    const parsedUrl = parseRequestUrl(req);
    const span = tracer.startSpan("http.request", {
      attributes: {
        "http.method": method,
        "http.target": parsedUrl.pathname,
      },
    });
    let thrown: unknown;

    await otelContext.with(trace.setSpan(otelContext.active(), span), async () => {
      try {
        if (method === "GET" && parsedUrl.pathname === "/metrics") {
          await metricsHandler(req, res);
          return;
        }
        await handleIncomingRequest(req, res, ctx, parsedUrl);
      } catch (error) {
        if (!writeErrorResponse(res, error)) {
          thrown = error;
        }
      }
    });

    if (thrown instanceof Error) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: thrown.message });
      span.recordException(thrown);
    }
    span.setAttribute("http.response.status_code", res.statusCode);
    span.end();

    const durationMs = Number(process.hrtime.bigint() - startAt) / 1_000_000;
    recordHttpRequest(method, routeLabel(parsedUrl.pathname), res.statusCode, durationMs);
    const logMeta = {
      context: {
        method,
        path: parsedUrl.pathname,
        statusCode: res.statusCode,
        durationMs,
      },
      error: thrown,
    };
    if (thrown) {
      httpLogger.error("http request failed", logMeta);
    } else {
      httpLogger.debug("http request handled", logMeta);
    }
  });
}

export async function handleIncomingRequest(
  req: RequestLike,
  res: ResponseLike,
  ctx: RequestContext,
  parsedUrl = parseRequestUrl(req)
) {
  const method = req.method ?? "GET";
  const path = parsedUrl.pathname.replace(/\/+$/, "") || "/";
  setCorsHeaders(res);

  if (method === "OPTIONS") {
    res.statusCode = 204;
    res.end();
    return;
  }

  if (method === "GET" && path === "/api/health") {
    sendJson(res, 200, { ok: true });
    return;
  }

  if (path === "/api/rooms") {
    if (method === "GET") {
      sendJson(res, 200, { rooms: ctx.registry.listRooms() });
      return;
    }
    if (method === "POST") {
      await handleCreateRoom(req, res, ctx);
      return;
    }
  }

  const roomCode = matchParam(path, "/api/rooms/");
  if (method === "GET" && roomCode) {
    const room = ctx.registry.getRoom(roomCode);
    if (!room) {
      throw new RoomRegistryError("ROOM_NOT_FOUND", "Room not found", 404);
    }
    sendJson(res, 200, buildRoomSummary(room.state));
    return;
  }

  if (path === "/api/players") {
    if (method === "GET") {
      const players = await ctx.stats.listPlayers();
      sendJson(res, 200, {
        players: players.map((player) => ({
          id: player.id,
          name: player.name,
          created_at: player.createdAt.toISOString(),
        })),
      });
      return;
    }
    if (method === "POST") {
      const body = await readJsonBody(req);
      const player = await ctx.stats.addPlayer(requireString(body, "name"));
      sendJson(res, 201, {
        id: player.id,
        name: player.name,
        created_at: player.createdAt.toISOString(),
      });
      return;
    }
  }

  const playerParam = matchParam(path, "/api/players/");
  if (method === "DELETE" && playerParam) {
    await ctx.stats.deletePlayer(parseId(playerParam, "player id"));
    res.statusCode = 204;
    res.end();
    return;
  }

  if (method === "POST" && path === "/api/matches") {
    await handleRecordMatch(req, res, ctx);
    return;
  }

  if (method === "GET" && path.startsWith("/api/stats/")) {
    await handleStats(res, ctx, path.slice("/api/stats/".length), parsedUrl);
    return;
  }

  sendJson(res, 404, { error: "NOT_FOUND" });
}

/**
 * Maps a thrown error onto the response. Returns false when the error was
 * unexpected (answered with a bare 500).
 */
export function writeErrorResponse(res: ResponseLike, error: unknown): boolean {
  if (error instanceof HttpError || error instanceof RoomRegistryError || error instanceof StatsError) {
    sendJson(res, error.status, { error: error.code, message: error.message });
    return true;
  }

  sendJson(res, 500, { error: "INTERNAL_ERROR" });
  return false;
}

async function handleCreateRoom(req: RequestLike, res: ResponseLike, ctx: RequestContext) {
  const body = await readJsonBody(req);
  const name = requireString(body, "name").slice(0, MAX_ROOM_NAME_LENGTH);

  const mode = body.mode === undefined ? undefined : parseGameMode(body.mode);
  if (body.mode !== undefined && !mode) {
    throw new HttpError(400, "INVALID_INPUT", "mode must be 'simple' or 'spicy'");
  }

  const room = ctx.registry.createRoom({ name, mode });
  sendJson(res, 201, { roomId: room.code, room: buildRoomSummary(room.state) });
}

async function handleRecordMatch(req: RequestLike, res: ResponseLike, ctx: RequestContext) {
  const body = await readJsonBody(req);
  const winnerId = parseId(body.winner_id, "winner_id");
  const participants = body.participants;
  if (!Array.isArray(participants)) {
    throw new HttpError(400, "INVALID_INPUT", "participants must be an array of player ids");
  }
  const participantIds = participants.map((value) => parseId(value, "participants"));

  const match = await ctx.stats.recordMatch(winnerId, participantIds);
  sendJson(res, 201, {
    id: match.id,
    winner_id: match.winnerId,
    participants: match.participantIds,
    played_at: match.playedAt.toISOString(),
  });
}

async function handleStats(res: ResponseLike, ctx: RequestContext, view: string, url: URL) {
  switch (view) {
    case "leaderboard":
      sendJson(res, 200, { players: await ctx.stats.leaderboard() });
      return;
    case "weekly":
      sendJson(res, 200, await ctx.stats.weeklyLeaderboard());
      return;
    case "recent": {
      const limit = parseCount(url.searchParams.get("limit"), DEFAULT_RECENT_LIMIT, 1, MAX_RECENT_LIMIT);
      sendJson(res, 200, { matches: await ctx.stats.recentMatches(limit) });
      return;
    }
    case "streaks":
      sendJson(res, 200, { streaks: await ctx.stats.winStreaks() });
      return;
    case "podium":
      sendJson(res, 200, { podium: await ctx.stats.podiumDays() });
      return;
    default:
      sendJson(res, 404, { error: "NOT_FOUND" });
  }
}

async function readJsonBody(req: RequestLike): Promise<Record<string, unknown>> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }

  const raw = Buffer.concat(chunks).toString("utf8").trim();
  if (!raw) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new HttpError(400, "INVALID_JSON", "Request body must be valid JSON");
  }
  if (!isRecord(parsed)) {
    throw new HttpError(400, "INVALID_JSON", "Request body must be a JSON object");
  }
  return parsed;
}

function requireString(body: Record<string, unknown>, field: string) {
  const value = body[field];
  if (typeof value !== "string" || !value.trim()) {
    throw new HttpError(400, "INVALID_INPUT", `${field} must be a non-empty string`);
  }
  return value.trim();
}

function parseId(value: unknown, field: string): number {
  const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 1) {
    throw new HttpError(400, "INVALID_INPUT", `${field} must be a positive integer`);
  }
  return parsed;
}

function parseCount(value: string | null, fallback: number, min: number, max: number) {
  if (value === null || !value.trim()) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isInteger(parsed) ? clamp(parsed, min, max) : fallback;
}

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

function matchParam(path: string, prefix: string): string | null {
  if (!path.startsWith(prefix)) {
    return null;
  }
  const rest = path.slice(prefix.length);
  if (!rest || rest.includes("/")) {
    return null;
  }
  try {
    return decodeURIComponent(rest);
  } catch {
    return null;
  }
}

/** Collapses path parameters so metric labels stay bounded. */
export function routeLabel(pathname: string): string {
  if (pathname.startsWith("/api/rooms/")) return "/api/rooms/:code";
  if (pathname.startsWith("/api/players/")) return "/api/players/:id";
  return pathname;
}

function parseRequestUrl(req: RequestLike) {
  const origin = `http://${req.headers.host ?? "localhost"}`;
  return new URL(req.url ?? "/", origin);
}

function setCorsHeaders(res: ResponseLike) {
  res.setHeader("Access-Control-Allow-Origin", "*");
  res.setHeader("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Content-Type");
}

function sendJson(res: ResponseLike, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
}
