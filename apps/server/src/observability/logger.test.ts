import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger, setLogLevel } from './logger.js';

function captureStream(stream: NodeJS.WriteStream) {
  const lines: string[] = [];
  vi.spyOn(stream, 'write').mockImplementation((chunk: string | Uint8Array) => {
    lines.push(String(chunk));
    return true;
  });
  return lines;
}

describe('StructuredLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('error');
  });

  it('writes room fields at the top level and merges child context', () => {
    setLogLevel('debug');
    const stdout = captureStream(process.stdout);

    logger
      .child({ context: { component: 'room-registry' } })
      .info('player left', { roomId: 'ABCDE', playerId: 'p1', phase: 'playing', context: { seats: 3 } });

    expect(stdout).toHaveLength(1);
    const entry: unknown = JSON.parse(stdout[0]);
    expect(entry).toMatchObject({
      level: 'info',
      message: 'player left',
      roomId: 'ABCDE',
      playerId: 'p1',
      phase: 'playing',
      context: { component: 'room-registry', seats: 3 },
      traceId: null,
      spanId: null,
    });
    expect(entry).not.toHaveProperty('mode');
  });

  it('sends warnings to stderr and drops entries below the threshold', () => {
    setLogLevel('warn');
    const stdout = captureStream(process.stdout);
    const stderr = captureStream(process.stderr);

    logger.info('game started', { roomId: 'ABCDE', mode: 'spicy' });
    logger.warn('delivery failed', { roomId: 'ABCDE', mode: 'spicy', error: new Error('socket closed') });

    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
    expect(JSON.parse(stderr[0])).toMatchObject({
      level: 'warn',
      mode: 'spicy',
      error: { name: 'Error', message: 'socket closed' },
    });
  });
});
