import { asc, eq } from 'drizzle-orm';
import type { DatabaseConnection } from '../db/client.js';
import { dbSchema } from '../db/client.js';
import type { MatchPlayerRow, MatchRow, PlayerRow } from '../db/schema.js';
import type { StatsMatch, StatsPlayer } from './leaderboard.js';
import type { NewMatch, StatsRepository } from './StatsRepository.js';

export class DrizzleStatsRepository implements StatsRepository {
  constructor(private readonly connection: DatabaseConnection) {}

  private get db() {
    return this.connection.db;
  }

  async listPlayers(): Promise<StatsPlayer[]> {
    const rows = await this.db.select().from(dbSchema.players).orderBy(asc(dbSchema.players.name));
    return rows.map(toPlayer);
  }

  async addPlayer(name: string): Promise<StatsPlayer | null> {
    const [inserted] = await this.db
      .insert(dbSchema.players)
      .values({ name: name.trim() })
      .onConflictDoNothing({ target: dbSchema.players.name })
      .returning();
    return inserted ? toPlayer(inserted) : null;
  }

  async deletePlayer(id: number): Promise<boolean> {
    const deleted = await this.db
      .delete(dbSchema.players)
      .where(eq(dbSchema.players.id, id))
      .returning({ id: dbSchema.players.id });
    return deleted.length > 0;
  }

  async recordMatch(input: NewMatch): Promise<StatsMatch> {
    const participantIds = Array.from(new Set(input.participantIds));

    return this.db.transaction(async (tx) => {
      const [match] = await tx
        .insert(dbSchema.matches)
        .values({ winnerId: input.winnerId, playedAt: input.playedAt })
        .returning();
      if (!match) {
        throw new Error('Match insert returned no row');
      }

      await tx
        .insert(dbSchema.matchPlayers)
        .values(participantIds.map((playerId) => ({ matchId: match.id, playerId })));

      return toMatch(match, participantIds);
    });
  }

  async listMatches(): Promise<StatsMatch[]> {
    const [matchRows, participantRows] = await Promise.all([
      this.db.select().from(dbSchema.matches).orderBy(asc(dbSchema.matches.playedAt), asc(dbSchema.matches.id)),
      this.db.select().from(dbSchema.matchPlayers),
    ]);

    const participants = groupParticipants(participantRows);
    return matchRows.map((row) => toMatch(row, participants.get(row.id) ?? []));
  }

  async close(): Promise<void> {
    await this.connection.pool.end();
  }
}

function toPlayer(row: PlayerRow): StatsPlayer {
  return { id: row.id, name: row.name, createdAt: row.createdAt };
}

function toMatch(row: MatchRow, participantIds: number[]): StatsMatch {
  return { id: row.id, winnerId: row.winnerId, playedAt: row.playedAt, participantIds };
}

function groupParticipants(rows: MatchPlayerRow[]): Map<number, number[]> {
  const grouped = new Map<number, number[]>();
  for (const row of rows) {
    const list = grouped.get(row.matchId);
    if (list) {
      list.push(row.playerId);
    } else {
      grouped.set(row.matchId, [row.playerId]);
    }
  }
  return grouped;
}
