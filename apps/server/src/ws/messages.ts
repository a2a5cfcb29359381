import type { RawData } from 'ws';
import { isClientActionName, isRecord } from '../rooms/actions.js';

export interface JoinRequest {
  roomCode: string;
  name: string;
}

export type ParsedUpgrade =
  | { ok: true; request: JoinRequest }
  | { ok: false; status: 400 | 404; message: string };

/** Accepts `/ws/:roomCode?name=` and `/ws?room=&name=`. */
export function parseJoinRequest(url: URL): ParsedUpgrade {
  const segments = url.pathname.split('/').filter(Boolean);
  if (segments[0] !== 'ws' || segments.length > 2) {
    return { ok: false, status: 404, message: 'Not Found' };
  }

  const roomCode = (segments[1] ? decodeSegment(segments[1]) : url.searchParams.get('room'))?.trim();
  const name = url.searchParams.get('name')?.trim();
  if (!roomCode || !name) {
    return { ok: false, status: 400, message: 'room and name are required' };
  }
  return { ok: true, request: { roomCode: roomCode.toUpperCase(), name } };
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

export class FrameDecodeError extends Error {
  constructor(message = 'Message must be valid JSON') {
    super(message);
    this.name = 'FrameDecodeError';
  }
}

export function decodeFrame(raw: RawData | string): unknown {
  try {
    return JSON.parse(rawToString(raw));
  } catch {
    throw new FrameDecodeError();
  }
}

/** Metric/span label for an inbound payload; unknown tags collapse to one value. */
export function describeAction(payload: unknown): string {
  if (!isRecord(payload)) {
    return 'invalid';
  }
  const action = payload.action;
  return isClientActionName(action) ? action : 'unknown';
}

function rawToString(raw: RawData | string): string {
  if (typeof raw === 'string') {
    return raw;
  }
  if (Array.isArray(raw)) {
    return Buffer.concat(raw).toString('utf8');
  }
  if (raw instanceof ArrayBuffer) {
    return Buffer.from(raw).toString('utf8');
  }
  return raw.toString('utf8');
}
