import { context as otelContext, trace } from '@opentelemetry/api';
import type { GameMode, PlayerId, RoomPhase } from '@trio/domain';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Room fields are top-level so a table's lines can be filtered without parsing `context`. */
export interface LogContext {
  roomId?: string | null;
  playerId?: PlayerId | null;
  phase?: RoomPhase;
  mode?: GameMode;
  context?: Record<string, unknown>;
  error?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function resolveThreshold(raw: string | undefined): number {
  const level = (raw ?? 'info').toLowerCase();
  return isLogLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.info;
}

let levelThreshold = resolveThreshold(process.env.LOG_LEVEL);

export function setLogLevel(level: LogLevel) {
  levelThreshold = LEVEL_ORDER[level];
}

function serializeError(error: unknown) {
  if (!error) return undefined;
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  if (typeof error === 'object') {
    return error;
  }
  return { message: String(error) };
}

function mergeContexts(base: LogContext | undefined, override: LogContext | undefined): LogContext {
  if (!base) return override ?? {};
  if (!override) return base;
  const merged: LogContext = { ...base, ...override };
  merged.context = { ...(base.context ?? {}), ...(override.context ?? {}) };
  return merged;
}

export class StructuredLogger {
  constructor(private readonly defaults: LogContext = {}) {}

  child(extra: LogContext = {}) {
    return new StructuredLogger(mergeContexts(this.defaults, extra));
  }

  debug(message: string, meta?: LogContext) {
    this.emit('debug', message, meta);
  }

  info(message: string, meta?: LogContext) {
    this.emit('info', message, meta);
  }

  warn(message: string, meta?: LogContext) {
    this.emit('warn', message, meta);
  }

  error(message: string, meta?: LogContext) {
    this.emit('error', message, meta);
  }

  private emit(level: LogLevel, message: string, meta?: LogContext) {
    if (LEVEL_ORDER[level] < levelThreshold) {
      return;
    }

    const payload = mergeContexts(this.defaults, meta);

    const span = trace.getSpan(otelContext.active());
    const spanContext = span?.spanContext();

    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      roomId: payload.roomId ?? null,
      playerId: payload.playerId ?? null,
      phase: payload.phase,
      mode: payload.mode,
      context: payload.context ?? {},
      traceId: spanContext?.traceId ?? null,
      spanId: spanContext?.spanId ?? null,
      error: serializeError(payload.error),
    };

    const serialized = JSON.stringify(logEntry);
    if (level === 'error' || level === 'warn') {
      process.stderr.write(`${serialized}\n`);
    } else {
      process.stdout.write(`${serialized}\n`);
    }
  }
}

export const logger = new StructuredLogger();
