import type { StatsMatch, StatsPlayer } from './leaderboard.js';
import type { NewMatch, StatsRepository } from './StatsRepository.js';

export class InMemoryStatsRepository implements StatsRepository {
  private readonly players = new Map<number, StatsPlayer>();
  private readonly matches = new Map<number, StatsMatch>();
  private nextPlayerId = 1;
  private nextMatchId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async listPlayers(): Promise<StatsPlayer[]> {
    return Array.from(this.players.values())
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map((player) => ({ ...player }));
  }

  async addPlayer(name: string): Promise<StatsPlayer | null> {
    const trimmed = name.trim();
    for (const player of this.players.values()) {
      if (player.name === trimmed) {
        return null;
      }
    }

    const player: StatsPlayer = { id: this.nextPlayerId, name: trimmed, createdAt: this.now() };
    this.nextPlayerId += 1;
    this.players.set(player.id, player);
    return { ...player };
  }

  async deletePlayer(id: number): Promise<boolean> {
    if (!this.players.delete(id)) {
      return false;
    }
    for (const match of this.matches.values()) {
      if (match.winnerId === id) {
        match.winnerId = null;
      }
      match.participantIds = match.participantIds.filter((participant) => participant !== id);
    }
    return true;
  }

  async recordMatch(input: NewMatch): Promise<StatsMatch> {
    const match: StatsMatch = {
      id: this.nextMatchId,
      winnerId: input.winnerId,
      playedAt: input.playedAt ?? this.now(),
      participantIds: Array.from(new Set(input.participantIds)),
    };
    this.nextMatchId += 1;
    this.matches.set(match.id, match);
    return copyMatch(match);
  }

  async listMatches(): Promise<StatsMatch[]> {
    return Array.from(this.matches.values(), copyMatch);
  }

  async close(): Promise<void> {
    this.players.clear();
    this.matches.clear();
  }
}

function copyMatch(match: StatsMatch): StatsMatch {
  return { ...match, participantIds: [...match.participantIds] };
}
