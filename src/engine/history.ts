import { P } from './params.js';
import { formatIsoDay } from './dates.js';
import { scorePlacement } from './scoring.js';
import type { Team, TournamentResults } from './types.js';

export interface FantasyResult {
  player: string;
  team: string;
  finish: string;
  points: number;
}

export interface TournamentHistoryEntry {
  name: string;
  eventId: string | null;
  date: string | null;
  location: string;
  tier: string;
  fantasyResults: FantasyResult[];
}

export const ordinalSuffix = (n: number) => {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) return 'th';
  switch (n % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
};

export const formatFinish = (placement: number) => `${placement}${ordinalSuffix(placement)} place`;

const toHistoryEntry = (item: TournamentResults, teams: readonly Team[]): TournamentHistoryEntry => {
  const fantasyResults: FantasyResult[] = [];
  for (const team of teams) {
    for (const player of team.players) {
      const result = item.results.find((row) => row.externalId === player.externalId);
      if (!result) continue;
      fantasyResults.push({
        player: player.name,
        team: team.name,
        finish: formatFinish(result.placement),
        points: scorePlacement(result.placement, item.tournament.tier, player.isUnderdog),
      });
    }
  }

  return {
    name: item.tournament.name,
    eventId: item.eventId,
    date: item.tournament.endDate ? formatIsoDay(item.tournament.endDate) : null,
    location: P.defaultLocation,
    tier: item.tournament.tier.label,
    fantasyResults,
  };
};

/** Appends the week's tournaments and evicts the oldest entries beyond `limit`. */
export function appendTournamentHistory(
  history: readonly TournamentHistoryEntry[],
  batch: readonly TournamentResults[],
  teams: readonly Team[],
  limit: number = P.historyLimit
): TournamentHistoryEntry[] {
  const next = [...history, ...batch.map((item) => toHistoryEntry(item, teams))];
  return next.length > limit ? next.slice(next.length - limit) : next;
}
