import type { Attributes } from '@opentelemetry/api';
import type { GameMode, WinReason } from '@trio/domain';
import { getMeter } from './telemetry.js';

const meter = getMeter();

const httpRequestDuration = meter.createHistogram('http_request_duration_ms', {
  description: 'Latency for handled HTTP requests',
  unit: 'ms',
});

const roomsCreated = meter.createCounter('rooms_created_total', {
  description: 'Number of rooms created',
});

const roomsActive = meter.createUpDownCounter('rooms_active', {
  description: 'Rooms currently tracked in the registry',
});

const gamesStarted = meter.createCounter('games_started_total', {
  description: 'Games dealt and started',
});

const gamesCompleted = meter.createCounter('games_completed_total', {
  description: 'Games that ended with a winner',
});

const triosCaptured = meter.createCounter('trios_captured_total', {
  description: 'Trios captured by players',
});

const turnsFailed = meter.createCounter('turns_failed_total', {
  description: 'Turns that ended on mismatched numbers',
});

const wsConnections = meter.createUpDownCounter('ws_connections_active', {
  description: 'Open WebSocket connections',
});

const wsMessages = meter.createCounter('ws_messages_total', {
  description: 'WebSocket messages received from clients',
});

const matchesRecorded = meter.createCounter('matches_recorded_total', {
  description: 'Matches written to the statistics store',
});

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationMs: number,
  attributes: Attributes = {},
) {
  httpRequestDuration.record(durationMs, {
    method,
    route,
    statusCode,
    ...attributes,
  });
}

export function trackRoomCreated(options: { mode: GameMode }) {
  roomsCreated.add(1, { mode: options.mode });
  roomsActive.add(1);
}

export function trackRoomClosed() {
  roomsActive.add(-1);
}

export function trackGameStarted(options: { mode: GameMode; players: number }) {
  gamesStarted.add(1, { mode: options.mode, players: options.players });
}

export function trackGameCompleted(options: { mode: GameMode; reason: WinReason }) {
  // Connected-trio reasons carry the pair; collapse them to keep cardinality low.
  const reason = options.reason.startsWith('connected trios') ? 'connected trios' : options.reason;
  gamesCompleted.add(1, { mode: options.mode, reason });
}

export function trackTrioCaptured(options: { mode: GameMode }) {
  triosCaptured.add(1, { mode: options.mode });
}

export function trackTurnFailed(options: { mode: GameMode }) {
  turnsFailed.add(1, { mode: options.mode });
}

export function trackWsConnection() {
  wsConnections.add(1);
}

export function trackWsDisconnection() {
  wsConnections.add(-1);
}

export function trackWsMessage(options: { action: string }) {
  wsMessages.add(1, { action: options.action });
}

export function trackMatchRecorded() {
  matchesRecorded.add(1);
}
