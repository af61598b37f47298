import { WeekBatchError } from './errors.js';
import type { SeasonState, StandingEntry, Team, WeeklyBreakdown, WeekSummary } from './types.js';

export const emptySeason = (): SeasonState => ({
  currentWeek: 0,
  standings: [],
  processedEventIds: [],
  lastUpdated: null,
});

export const nextWeek = (season: Pick<SeasonState, 'currentWeek'>) => season.currentWeek + 1;

/**
 * Recomputes totals and ranks from the weekly breakdowns. Lower totals rank
 * higher; equal totals share a rank and the following rank is skipped.
 * Entries are copied, breakdown records are left as they are.
 */
export function rankStandings(entries: readonly StandingEntry[]): StandingEntry[] {
  const totals = entries.map((entry) => ({
    ...entry,
    totalScore: entry.weeklyBreakdown.reduce((sum, week) => sum + week.score, 0),
    weeksCounted: entry.weeklyBreakdown.length,
  }));

  totals.sort((a, b) => a.totalScore - b.totalScore);

  const ranked: StandingEntry[] = [];
  totals.forEach((entry, idx) => {
    const previous = ranked[idx - 1];
    const rank = previous && previous.totalScore === entry.totalScore ? previous.rank : idx + 1;
    ranked.push({ ...entry, rank });
  });
  return ranked;
}

const toBreakdown = (summary: WeekSummary, teamName: string): WeeklyBreakdown => {
  const result = summary.teams.find((team) => team.teamName === teamName);
  return {
    week: summary.week,
    score: result?.teamWeekScore ?? 0,
    topPlayers: (result?.selected ?? []).map((pick) => ({
      name: pick.player.name,
      score: pick.weekScore,
      tournaments: pick.tournamentsPlayed,
    })),
    tournaments: [...summary.tournaments],
  };
};

/**
 * Folds a scored week into the season: one breakdown per rostered team, the
 * week counter advanced to the summary's week and its events marked processed.
 */
export function recordWeek(
  season: SeasonState,
  summary: WeekSummary,
  teams: readonly Team[],
  now: Date = new Date()
): SeasonState {
  if (summary.week !== nextWeek(season)) {
    throw new WeekBatchError(
      `expected week ${nextWeek(season)}, got week ${summary.week}`,
      'week_out_of_order',
      { week: summary.week }
    );
  }

  const standings: StandingEntry[] = season.standings.map((entry) => ({
    ...entry,
    weeklyBreakdown: [...entry.weeklyBreakdown],
  }));

  for (const team of teams) {
    const target = standings.find((entry) => entry.teamName === team.name);
    const breakdown = toBreakdown(summary, team.name);
    if (target) {
      target.weeklyBreakdown.push(breakdown);
    } else {
      standings.push({
        teamName: team.name,
        owner: team.owner,
        rank: 0,
        totalScore: 0,
        weeksCounted: 0,
        weeklyBreakdown: [breakdown],
      });
    }
  }

  return {
    currentWeek: summary.week,
    standings: rankStandings(standings),
    processedEventIds: [...season.processedEventIds, ...summary.eventIds],
    lastUpdated: now.toISOString(),
  };
}
