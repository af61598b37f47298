import type { Team } from './types.js';

export type PlayerStatsFilter = 'all' | 'counted' | 'underdogs';

export interface PlayerStatLine {
  name: string;
  externalId: number;
  team: string;
  owner: string;
  isUnderdog: boolean;
  seasonTotal: number;
  tournamentsPlayed: number;
  timesCounted: number;
  averageWhenCounted: number;
}

/**
 * League-wide player leaderboard. Players with a counted score lead, lowest
 * total first; players never counted follow in roster order.
 */
export function buildPlayerStats(teams: readonly Team[]): PlayerStatLine[] {
  const lines: PlayerStatLine[] = teams.flatMap((team) =>
    team.players.map((player) => ({
      name: player.name,
      externalId: player.externalId,
      team: team.name,
      owner: team.owner,
      isUnderdog: player.isUnderdog,
      seasonTotal: player.seasonTotal,
      tournamentsPlayed: player.tournamentsPlayed,
      timesCounted: player.timesCounted,
      averageWhenCounted: player.timesCounted > 0 ? player.seasonTotal / player.timesCounted : 0,
    }))
  );

  const scored = lines.filter((line) => line.seasonTotal > 0).sort((a, b) => a.seasonTotal - b.seasonTotal);
  const unscored = lines.filter((line) => line.seasonTotal <= 0);
  return [...scored, ...unscored];
}

export function filterPlayerStats(lines: readonly PlayerStatLine[], filter: PlayerStatsFilter): PlayerStatLine[] {
  switch (filter) {
    case 'counted':
      return lines.filter((line) => line.timesCounted > 0);
    case 'underdogs':
      return lines.filter((line) => line.isUnderdog);
    default:
      return [...lines];
  }
}
