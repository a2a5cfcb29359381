import { MAX_SEATS, MIN_SEATS } from '@trio/domain';
import { isLogLevel, type LogLevel } from '../observability/logger.js';

export interface ServerEnv {
  port: number;
  host: string;
  minPlayers: number;
  maxPlayers: number;
  failRevealDelayMs: number;
  databaseUrl: string | null;
  logLevel: LogLevel;
}

const parseInteger = (
  name: string,
  value: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new Error(`Invalid ${name} value "${value}". Expected an integer between ${min} and ${max}.`);
  }
  return parsed;
};

const parseLogLevel = (value: string | undefined): LogLevel => {
  if (!value) {
    return 'info';
  }
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid LOG_LEVEL value "${value}". Expected one of debug, info, warn, error.`);
  }
  return normalized;
};

export const readServerEnv = (source: NodeJS.ProcessEnv = process.env): ServerEnv => {
  const port = parseInteger('PORT', source.PORT, 3000, 1, 65535);
  const minPlayers = parseInteger('MIN_PLAYERS', source.MIN_PLAYERS, MIN_SEATS, MIN_SEATS, MAX_SEATS);
  const maxPlayers = parseInteger('MAX_PLAYERS', source.MAX_PLAYERS, MAX_SEATS, MIN_SEATS, MAX_SEATS);

  if (minPlayers > maxPlayers) {
    throw new Error(`MIN_PLAYERS (${minPlayers}) cannot exceed MAX_PLAYERS (${maxPlayers}).`);
  }

  return {
    port,
    host: source.HOST?.trim() || '0.0.0.0',
    minPlayers,
    maxPlayers,
    failRevealDelayMs: parseInteger('FAIL_REVEAL_DELAY_MS', source.FAIL_REVEAL_DELAY_MS, 2500, 0, 60_000),
    databaseUrl: source.DATABASE_URL?.trim() || null,
    logLevel: parseLogLevel(source.LOG_LEVEL),
  };
};
