import { logger } from '../observability/logger.js';
import { trackMatchRecorded } from '../observability/metrics.js';
import {
  DEFAULT_RECENT_LIMIT,
  type LeaderboardRow,
  type PodiumEntry,
  type RecentMatch,
  type StatsMatch,
  type StatsPlayer,
  type WeeklyLeaderboard,
  type WinStreak,
  buildLeaderboard,
  buildPodiumDays,
  buildRecentMatches,
  buildWeeklyLeaderboard,
  buildWinStreaks,
} from './leaderboard.js';
import type { StatsRepository } from './StatsRepository.js';

export const MAX_PLAYER_NAME_LENGTH = 64;

export type StatsErrorCode = 'INVALID_INPUT' | 'PLAYER_EXISTS' | 'PLAYER_NOT_FOUND';

export class StatsError extends Error {
  constructor(
    public readonly code: StatsErrorCode,
    message: string,
    public readonly status: number = 400,
  ) {
    super(message);
    this.name = 'StatsError';
  }
}

const statsLogger = logger.child({ context: { component: 'stats' } });

export class StatsService {
  constructor(
    private readonly repository: StatsRepository,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  listPlayers(): Promise<StatsPlayer[]> {
    return this.repository.listPlayers();
  }

  async addPlayer(name: string): Promise<StatsPlayer> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new StatsError('INVALID_INPUT', 'Player name required');
    }
    if (trimmed.length > MAX_PLAYER_NAME_LENGTH) {
      throw new StatsError('INVALID_INPUT', `Player name must be at most ${MAX_PLAYER_NAME_LENGTH} characters`);
    }

    const player = await this.repository.addPlayer(trimmed);
    if (!player) {
      throw new StatsError('PLAYER_EXISTS', 'Player already exists', 409);
    }
    statsLogger.info('stats player added', { context: { id: player.id, name: player.name } });
    return player;
  }

  async deletePlayer(id: number): Promise<void> {
    if (!(await this.repository.deletePlayer(id))) {
      throw new StatsError('PLAYER_NOT_FOUND', 'Player not found', 404);
    }
    statsLogger.info('stats player deleted', { context: { id } });
  }

  async recordMatch(winnerId: number, participantIds: number[]): Promise<StatsMatch> {
    const participants = Array.from(new Set(participantIds));
    if (!participants.includes(winnerId)) {
      throw new StatsError('INVALID_INPUT', 'Winner must be a participant');
    }
    if (participants.length < 2) {
      throw new StatsError('INVALID_INPUT', 'At least 2 players required');
    }

    const known = new Set((await this.repository.listPlayers()).map((player) => player.id));
    const unknown = participants.find((id) => !known.has(id));
    if (unknown !== undefined) {
      throw new StatsError('PLAYER_NOT_FOUND', `Unknown player id ${unknown}`, 404);
    }

    const match = await this.repository.recordMatch({ winnerId, participantIds: participants, playedAt: this.clock() });
    trackMatchRecorded();
    statsLogger.info('match recorded', {
      context: { matchId: match.id, winnerId, participants: participants.length },
    });
    return match;
  }

  async leaderboard(): Promise<LeaderboardRow[]> {
    const [players, matches] = await this.load();
    return buildLeaderboard(players, matches);
  }

  async weeklyLeaderboard(): Promise<WeeklyLeaderboard> {
    const [players, matches] = await this.load();
    return buildWeeklyLeaderboard(players, matches, this.clock());
  }

  async recentMatches(limit = DEFAULT_RECENT_LIMIT): Promise<RecentMatch[]> {
    const [players, matches] = await this.load();
    return buildRecentMatches(players, matches, limit);
  }

  async winStreaks(): Promise<WinStreak[]> {
    const [players, matches] = await this.load();
    return buildWinStreaks(players, matches);
  }

  async podiumDays(): Promise<PodiumEntry[]> {
    const [players, matches] = await this.load();
    return buildPodiumDays(players, matches);
  }

  close(): Promise<void> {
    return this.repository.close();
  }

  private load(): Promise<[StatsPlayer[], StatsMatch[]]> {
    return Promise.all([this.repository.listPlayers(), this.repository.listMatches()]);
  }
}
