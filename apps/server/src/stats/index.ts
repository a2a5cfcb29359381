import type { ServerEnv } from '../config/env.js';
import { createDatabase } from '../db/client.js';
import { logger } from '../observability/logger.js';
import { DrizzleStatsRepository } from './DrizzleStatsRepository.js';
import { InMemoryStatsRepository } from './InMemoryStatsRepository.js';
import { StatsService } from './StatsService.js';

export { StatsError, StatsService } from './StatsService.js';
export type { StatsRepository } from './StatsRepository.js';

/** Postgres when DATABASE_URL is set, otherwise a process-local store. */
export function createStatsService(env: Pick<ServerEnv, 'databaseUrl'>): StatsService {
  if (env.databaseUrl) {
    return new StatsService(new DrizzleStatsRepository(createDatabase({ connectionString: env.databaseUrl })));
  }
  logger.warn('DATABASE_URL not set, statistics are kept in memory', { context: { component: 'stats' } });
  return new StatsService(new InMemoryStatsRepository());
}
