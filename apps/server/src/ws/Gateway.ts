import { randomUUID } from "node:crypto";
import { STATUS_CODES, type IncomingMessage, type Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { URL } from "node:url";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import { context as otelContext, SpanStatusCode, trace } from "@opentelemetry/api";
import type { PlayerId, ServerMessage } from "@trio/domain";
import { RoomRegistry, RoomRegistryError } from "../rooms/RoomRegistry.js";
import { getTracer } from "../observability/telemetry.js";
import { logger } from "../observability/logger.js";
import { trackWsConnection, trackWsDisconnection, trackWsMessage } from "../observability/metrics.js";
import { FrameDecodeError, type JoinRequest, decodeFrame, describeAction, parseJoinRequest } from "./messages.js";

/** The slice of a `ws` socket the gateway drives. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: "message", listener: (data: RawData) => void): this;
  on(event: "close", listener: (code: number, reason: Buffer) => void): this;
  on(event: "error", listener: (error: Error) => void): this;
}

interface GatewayOptions {
  registry: RoomRegistry;
}

export interface SocketSession {
  socketId: string;
  socket: ClientSocket;
  roomCode: string;
  /** Resolves to the seat id once the join commits, or null when it was refused. */
  joined: Promise<PlayerId | null>;
}

export const JOIN_REJECTED_CLOSE_CODE = 4000;
const INTERNAL_ERROR_CLOSE_CODE = 1011;

const tracer = getTracer();
const wsLogger = logger.child({ context: { component: "ws-gateway" } });

export class WebSocketGateway {
  private readonly registry: RoomRegistry;
  private readonly wss: WebSocketServer;
  private readonly sessions = new Map<string, SocketSession>();

  constructor(server: HttpServer, options: GatewayOptions) {
    this.registry = options.registry;
    this.wss = new WebSocketServer({ noServer: true });

    server.on("upgrade", (req, socket, head) => {
      this.handleUpgrade(req, socket, head);
    });
  }

  get connectionCount() {
    return this.sessions.size;
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer) {
    const parsedUrl = this.parseRequestUrl(req);
    const parsed = parseJoinRequest(parsedUrl);
    if (!parsed.ok) {
      wsLogger.warn("rejecting upgrade", {
        context: { path: parsedUrl.pathname, status: parsed.status },
      });
      this.rejectUpgrade(socket, parsed.status, parsed.message);
      return;
    }

    const { request } = parsed;
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit("connection", ws, req);
      this.handleConnection(ws, request);
    });
  }

  protected handleConnection(socket: ClientSocket, request: JoinRequest): SocketSession {
    const session: SocketSession = {
      socketId: randomUUID(),
      socket,
      roomCode: request.roomCode,
      joined: this.joinRoom(socket, request),
    };
    this.sessions.set(session.socketId, session);
    trackWsConnection();

    socket.on("message", (data) => {
      this.handleMessage(session, data).catch((error: unknown) => {
        wsLogger.error("ws message handling failed", { roomId: session.roomCode, error });
      });
    });
    socket.on("close", (code, reason) => {
      this.handleDisconnect(session, code, reason).catch((error: unknown) => {
        wsLogger.error("ws disconnect handling failed", { roomId: session.roomCode, error });
      });
    });
    socket.on("error", (error) => {
      wsLogger.error("ws socket error", { roomId: session.roomCode, error });
    });

    return session;
  }

  private async joinRoom(socket: ClientSocket, request: JoinRequest): Promise<PlayerId | null> {
    try {
      const { playerId } = await this.registry.join(request.roomCode, request.name, {
        send: (message) => this.send(socket, message),
      });
      wsLogger.info("ws connected", { roomId: request.roomCode, playerId });
      return playerId;
    } catch (error) {
      if (error instanceof RoomRegistryError) {
        wsLogger.info("join refused", {
          roomId: request.roomCode,
          context: { code: error.code },
        });
        this.notify(socket, { type: "error", code: error.code, message: error.message });
        socket.close(JOIN_REJECTED_CLOSE_CODE, error.code);
        return null;
      }

      wsLogger.error("join failed", { roomId: request.roomCode, error });
      this.notify(socket, { type: "error", code: "JOIN_FAILED", message: "Unable to join room" });
      socket.close(INTERNAL_ERROR_CLOSE_CODE, "JOIN_FAILED");
      return null;
    }
  }

  private async handleMessage(session: SocketSession, raw: RawData) {
    const playerId = await session.joined;
    if (!playerId) {
      return;
    }

    const span = tracer.startSpan("ws.message", {
      attributes: { "room.id": session.roomCode, "player.id": playerId },
    });
    try {
      let payload: unknown;
      try {
        payload = decodeFrame(raw);
      } catch (error) {
        if (!(error instanceof FrameDecodeError)) {
          throw error;
        }
        trackWsMessage({ action: "invalid" });
        this.notify(session.socket, { type: "error", code: "INVALID_PAYLOAD", message: error.message });
        return;
      }

      const action = describeAction(payload);
      span.setAttribute("ws.action", action);
      trackWsMessage({ action });

      const ctx = trace.setSpan(otelContext.active(), span);
      await otelContext.with(ctx, () => this.registry.dispatch(playerId, payload));
    } catch (error) {
      if (error instanceof Error) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  }

  private async handleDisconnect(session: SocketSession, code?: number, reason?: Buffer) {
    this.sessions.delete(session.socketId);
    trackWsDisconnection();

    const playerId = await session.joined;
    const reasonText = reason && reason.length > 0 ? reason.toString("utf8") : undefined;
    wsLogger.info("ws disconnected", {
      roomId: session.roomCode,
      playerId: playerId ?? undefined,
      context: { socketId: session.socketId, code, reason: reasonText },
    });

    if (playerId) {
      await this.registry.leave(playerId);
    }
  }

  shutdown() {
    for (const session of this.sessions.values()) {
      try {
        session.socket.terminate();
      } catch (error) {
        wsLogger.warn("error terminating socket during shutdown", {
          roomId: session.roomCode,
          error,
        });
      }
    }
    this.sessions.clear();
    this.wss.close();
  }

  /** Seat delivery; throwing tells the registry the seat is gone. */
  private send(socket: ClientSocket, payload: ServerMessage) {
    if (socket.readyState !== WebSocket.OPEN) {
      throw new Error("Socket is not open");
    }
    socket.send(JSON.stringify(payload));
  }

  private notify(socket: ClientSocket, payload: ServerMessage) {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(payload));
    }
  }

  private parseRequestUrl(req: IncomingMessage) {
    const origin = `http://${req.headers.host ?? "localhost"}`;
    return new URL(req.url ?? "/", origin);
  }

  private rejectUpgrade(socket: Duplex, status: number, message: string) {
    socket.write(
      `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? "Error"}\r\nConnection: close\r\n\r\n${message}`
    );
    socket.destroy();
  }
}
