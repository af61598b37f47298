import type { TournamentHistoryEntry } from '../engine/history.js';
import type { PlayerStatLine } from '../engine/player-stats.js';
import type { SeasonState, Team } from '../engine/types.js';
import type {
  PlayerStatsDocument,
  RostersDocument,
  StandingsDocument,
  TournamentHistoryDocument,
} from '../store/index.js';

export const teamsFromRosters = (doc: RostersDocument): Team[] =>
  doc.teams.map((team) => ({
    name: team.team_name,
    owner: team.owner,
    players: team.players.map((player) => ({
      name: player.name,
      externalId: player.pdga_number,
      isUnderdog: player.is_underdog,
      seasonTotal: player.season_total,
      timesCounted: player.times_counted,
      tournamentsPlayed: player.tournaments_played,
      weeklyScores: player.weekly_scores.map((entry) => ({ ...entry })),
    })),
  }));

export const rostersFromTeams = (teams: readonly Team[]): RostersDocument => ({
  teams: teams.map((team) => ({
    team_name: team.name,
    owner: team.owner,
    players: team.players.map((player) => ({
      name: player.name,
      pdga_number: player.externalId,
      is_underdog: player.isUnderdog,
      season_total: player.seasonTotal,
      times_counted: player.timesCounted,
      tournaments_played: player.tournamentsPlayed,
      weekly_scores: player.weeklyScores.map((entry) => ({ ...entry })),
    })),
  })),
});

export const seasonFromStandings = (doc: StandingsDocument): SeasonState => ({
  currentWeek: doc.current_week,
  lastUpdated: doc.last_updated,
  processedEventIds: [...doc.processed_events],
  standings: doc.standings.map((entry) => ({
    teamName: entry.team_name,
    owner: entry.owner,
    rank: entry.rank,
    totalScore: entry.total_score,
    weeksCounted: entry.weeks_counted,
    weeklyBreakdown: entry.weekly_breakdown.map((week) => ({
      week: week.week,
      score: week.score,
      topPlayers: week.top_3_players.map((pick) => ({ ...pick })),
      tournaments: [...week.tournaments],
    })),
  })),
});

export const standingsFromSeason = (season: SeasonState): StandingsDocument => ({
  current_week: season.currentWeek,
  last_updated: season.lastUpdated,
  processed_events: [...season.processedEventIds],
  standings: season.standings.map((entry) => ({
    team_name: entry.teamName,
    owner: entry.owner,
    rank: entry.rank,
    total_score: entry.totalScore,
    weeks_counted: entry.weeksCounted,
    weekly_breakdown: entry.weeklyBreakdown.map((week) => ({
      week: week.week,
      score: week.score,
      top_3_players: week.topPlayers.map((pick) => ({ ...pick })),
      tournaments: [...week.tournaments],
    })),
  })),
});

export const historyFromDocument = (doc: TournamentHistoryDocument): TournamentHistoryEntry[] =>
  doc.tournaments.map((entry) => ({
    name: entry.name,
    eventId: entry.event_id,
    date: entry.date,
    location: entry.location,
    tier: entry.tier,
    fantasyResults: entry.fantasy_results.map((result) => ({ ...result })),
  }));

export const historyToDocument = (entries: readonly TournamentHistoryEntry[]): TournamentHistoryDocument => ({
  tournaments: entries.map((entry) => ({
    name: entry.name,
    event_id: entry.eventId,
    date: entry.date,
    location: entry.location,
    tier: entry.tier,
    fantasy_results: entry.fantasyResults.map((result) => ({ ...result })),
  })),
});

export const playerStatLineToDocument = (line: PlayerStatLine): PlayerStatsDocument['player_stats'][number] => ({
  name: line.name,
  pdga_number: line.externalId,
  team: line.team,
  owner: line.owner,
  is_underdog: line.isUnderdog,
  season_total: line.seasonTotal,
  tournaments_played: line.tournamentsPlayed,
  times_counted: line.timesCounted,
  average_when_counted: line.averageWhenCounted,
});

export const playerStatsToDocument = (lines: readonly PlayerStatLine[], now: Date): PlayerStatsDocument => ({
  last_updated: now.toISOString(),
  player_stats: lines.map(playerStatLineToDocument),
});
