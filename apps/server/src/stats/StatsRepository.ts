import type { StatsMatch, StatsPlayer } from './leaderboard.js';

export interface NewMatch {
  winnerId: number;
  participantIds: number[];
  playedAt?: Date;
}

/** Storage for the statistics side of the app. Aggregation lives in `leaderboard.ts`. */
export interface StatsRepository {
  /** Ordered by name. */
  listPlayers(): Promise<StatsPlayer[]>;
  /** Resolves to null when the name is already taken. */
  addPlayer(name: string): Promise<StatsPlayer | null>;
  deletePlayer(id: number): Promise<boolean>;
  recordMatch(match: NewMatch): Promise<StatsMatch>;
  listMatches(): Promise<StatsMatch[]>;
  close(): Promise<void>;
}
