import { classifyTier } from '../../src/engine/tiers.js';
import type { Player, ResultRow, Team, Tournament, TournamentResults } from '../../src/engine/types.js';
import type { LeagueDocuments } from '../../src/store/index.js';

export const utc = (year: number, month: number, day: number) => new Date(Date.UTC(year, month - 1, day));

export const createTournament = (
  name: string,
  tier: string,
  overrides: Partial<Omit<Tournament, 'name' | 'tier' | 'tierAbbreviation'>> = {}
): Tournament => ({
  name,
  tierAbbreviation: tier,
  tier: classifyTier(tier),
  datesRaw: 'May 1 - 4',
  startDate: utc(2025, 5, 1),
  endDate: utc(2025, 5, 4),
  eventId: null,
  ...overrides,
});

export const createPlayer = (name: string, externalId: number, overrides: Partial<Player> = {}): Player => ({
  name,
  externalId,
  isUnderdog: false,
  seasonTotal: 0,
  timesCounted: 0,
  tournamentsPlayed: 0,
  weeklyScores: [],
  ...overrides,
});

export const createTeam = (name: string, owner: string, players: Player[]): Team => ({ name, owner, players });

export const rows = (entries: Array<[placement: number, externalId: number]>): ResultRow[] =>
  entries.map(([placement, externalId]) => ({ placement, externalId, name: `Player ${externalId}`, tied: false }));

export const batchItem = (tournament: Tournament, eventId: string, results: ResultRow[]): TournamentResults => ({
  tournament,
  eventId,
  division: 'MPO',
  results,
});

export const leagueDocuments = (): LeagueDocuments => ({
  rosters: {
    teams: [
      {
        team_name: 'Chain Gang',
        owner: 'Alex',
        players: [
          { name: 'Ada', pdga_number: 101, is_underdog: false, season_total: 0, times_counted: 0, tournaments_played: 0, weekly_scores: [] },
          { name: 'Bo', pdga_number: 102, is_underdog: false, season_total: 0, times_counted: 0, tournaments_played: 0, weekly_scores: [] },
          { name: 'Cy', pdga_number: 103, is_underdog: true, season_total: 0, times_counted: 0, tournaments_played: 0, weekly_scores: [] },
        ],
      },
      {
        team_name: 'Birdie Brigade',
        owner: 'Sam',
        players: [
          { name: 'Dee', pdga_number: 201, is_underdog: false, season_total: 0, times_counted: 0, tournaments_played: 0, weekly_scores: [] },
          { name: 'Eli', pdga_number: 202, is_underdog: false, season_total: 0, times_counted: 0, tournaments_played: 0, weekly_scores: [] },
        ],
      },
    ],
  },
  standings: { current_week: 0, last_updated: null, processed_events: [], standings: [] },
  tournament_history: { tournaments: [] },
  player_stats: { last_updated: null, player_stats: [] },
});
