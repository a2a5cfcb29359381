/**
 * Leaderboard aggregations over recorded matches. Every repository loads its
 * rows into these shapes and the numbers are computed here, once.
 */

export interface StatsPlayer {
  id: number;
  name: string;
  createdAt: Date;
}

export interface StatsMatch {
  id: number;
  /** Null when the winner's player record was deleted. */
  winnerId: number | null;
  playedAt: Date;
  participantIds: number[];
}

export interface LeaderboardRow {
  id: number;
  name: string;
  wins: number;
  matches_played: number;
  win_rate: number;
}

export interface WeeklyLeaderboard {
  players: LeaderboardRow[];
  week_start: string;
  week_end: string;
}

export interface RecentMatch {
  id: number;
  played_at: string;
  winner_id: number;
  winner_name: string;
  opponents: Array<{ id: number; name: string }>;
}

export interface WinStreak {
  player_id: number;
  name: string;
  streak: number;
}

export interface PodiumEntry {
  name: string;
  best_position: number;
  days: number;
}

export const DEFAULT_RECENT_LIMIT = 10;
const PODIUM_SIZE = 3;
const MIN_STREAK = 2;

interface LeaderboardOptions {
  includeMatch?: (match: StatsMatch) => boolean;
  /** Drop players without a counted match. */
  activeOnly?: boolean;
}

export function buildLeaderboard(
  players: readonly StatsPlayer[],
  matches: readonly StatsMatch[],
  options: LeaderboardOptions = {},
): LeaderboardRow[] {
  const counted = options.includeMatch ? matches.filter(options.includeMatch) : matches;

  const rows = players.map((player) => {
    const wins = counted.filter((match) => match.winnerId === player.id).length;
    const played = counted.filter((match) => match.participantIds.includes(player.id)).length;
    return {
      id: player.id,
      name: player.name,
      wins,
      matches_played: played,
      win_rate: winRate(wins, played),
    };
  });

  return rows
    .filter((row) => !options.activeOnly || row.matches_played > 0)
    .sort(compareRows);
}

export function winRate(wins: number, played: number): number {
  if (played === 0) {
    return 0;
  }
  return Math.round((wins * 1000) / played) / 10;
}

function compareRows(a: LeaderboardRow, b: LeaderboardRow): number {
  if (a.wins !== b.wins) {
    return b.wins - a.wins;
  }
  if (a.win_rate !== b.win_rate) {
    return b.win_rate - a.win_rate;
  }
  if (a.name === b.name) {
    return 0;
  }
  return a.name < b.name ? -1 : 1;
}

/** Monday 00:00:00.000 through Friday 23:59:59.999 of the week containing `now`, local time. */
export function workWeekBounds(now: Date): { start: Date; end: Date } {
  const daysSinceMonday = (now.getDay() + 6) % 7;
  const mondayDate = now.getDate() - daysSinceMonday;
  const start = new Date(now.getFullYear(), now.getMonth(), mondayDate, 0, 0, 0, 0);
  const end = new Date(now.getFullYear(), now.getMonth(), mondayDate + 4, 23, 59, 59, 999);
  return { start, end };
}

export function buildWeeklyLeaderboard(
  players: readonly StatsPlayer[],
  matches: readonly StatsMatch[],
  now: Date,
): WeeklyLeaderboard {
  const { start, end } = workWeekBounds(now);
  const from = start.getTime();
  const to = end.getTime();

  return {
    players: buildLeaderboard(players, matches, {
      includeMatch: (match) => match.playedAt.getTime() >= from && match.playedAt.getTime() <= to,
      activeOnly: true,
    }),
    week_start: formatDayMonth(start),
    week_end: formatDayMonth(end),
  };
}

export function formatDayMonth(date: Date): string {
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}`;
}

export function buildRecentMatches(
  players: readonly StatsPlayer[],
  matches: readonly StatsMatch[],
  limit = DEFAULT_RECENT_LIMIT,
): RecentMatch[] {
  const byId = new Map(players.map((player) => [player.id, player]));
  const recent: RecentMatch[] = [];

  for (const match of newestFirst(matches)) {
    if (recent.length >= limit) {
      break;
    }
    const winner = match.winnerId === null ? undefined : byId.get(match.winnerId);
    if (!winner) {
      continue;
    }
    recent.push({
      id: match.id,
      played_at: match.playedAt.toISOString(),
      winner_id: winner.id,
      winner_name: winner.name,
      opponents: match.participantIds.flatMap((id) => {
        const opponent = id === winner.id ? undefined : byId.get(id);
        return opponent ? [{ id: opponent.id, name: opponent.name }] : [];
      }),
    });
  }

  return recent;
}

/** The latest winner's run of consecutive wins, reported from two wins up. */
export function buildWinStreaks(players: readonly StatsPlayer[], matches: readonly StatsMatch[]): WinStreak[] {
  const byId = new Map(players.map((player) => [player.id, player]));
  let holder: StatsPlayer | undefined;
  let streak = 0;

  for (const match of newestFirst(matches)) {
    const winner = match.winnerId === null ? undefined : byId.get(match.winnerId);
    if (!winner) {
      continue;
    }
    if (!holder) {
      holder = winner;
      streak = 1;
    } else if (winner.id === holder.id) {
      streak += 1;
    } else {
      break;
    }
  }

  if (!holder || streak < MIN_STREAK) {
    return [];
  }
  return [{ player_id: holder.id, name: holder.name, streak }];
}

/**
 * Replays the cumulative leaderboard at the end of every day that had a match
 * and records, per player, the best top-three position reached and on how many
 * match days they held it.
 */
export function buildPodiumDays(players: readonly StatsPlayer[], matches: readonly StatsMatch[]): PodiumEntry[] {
  const days = Array.from(new Set(matches.map((match) => dayKey(match.playedAt)))).sort();
  const podium = new Map<number, PodiumEntry>();

  for (const day of days) {
    const standings = buildLeaderboard(players, matches, {
      includeMatch: (match) => dayKey(match.playedAt) <= day,
      activeOnly: true,
    });

    standings.slice(0, PODIUM_SIZE).forEach((row, index) => {
      const position = index + 1;
      const current = podium.get(row.id);
      if (!current || position < current.best_position) {
        podium.set(row.id, { name: row.name, best_position: position, days: 1 });
      } else if (position === current.best_position) {
        current.days += 1;
      }
    });
  }

  return Array.from(podium.values()).sort((a, b) => a.best_position - b.best_position || b.days - a.days);
}

function newestFirst(matches: readonly StatsMatch[]): StatsMatch[] {
  return [...matches].sort((a, b) => b.playedAt.getTime() - a.playedAt.getTime() || b.id - a.id);
}

function dayKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
