export type MappedTierName = 'Elite Series' | 'Elite Series Plus' | 'Major';

export interface MappedTier {
  kind: 'mapped';
  abbreviation: string;
  name: MappedTierName;
  multiplier: number;
  label: string;
}

// Abbreviation missing from the tier table; scores like a 1.0 tier but stays distinguishable.
export interface UnmappedTier {
  kind: 'unmapped';
  abbreviation: string;
  name: 'Unmapped';
  multiplier: 1;
  label: 'Unmapped';
}

export type Tier = MappedTier | UnmappedTier;

export interface Tournament {
  readonly name: string;
  readonly tierAbbreviation: string;
  readonly tier: Tier;
  readonly datesRaw: string;
  readonly startDate: Date | null;
  readonly endDate: Date | null;
  readonly eventId: string | null;
}

export interface WeeklyScoreEntry {
  week: number;
  tournament: string;
  placement: number;
  score: number;
  tier: string;
  counted: boolean;
}

export interface Player {
  name: string;
  externalId: number;
  isUnderdog: boolean;
  seasonTotal: number;
  timesCounted: number;
  tournamentsPlayed: number;
  weeklyScores: WeeklyScoreEntry[];
}

export interface Team {
  name: string;
  owner: string;
  players: Player[];
}

export interface ResultRow {
  placement: number;
  externalId: number;
  name: string;
  tied: boolean;
}

export interface TournamentResults {
  tournament: Tournament;
  eventId: string;
  division: string;
  results: ResultRow[];
}

export interface CountedPlayer {
  name: string;
  score: number;
  tournaments: number;
}

export interface WeeklyBreakdown {
  week: number;
  score: number;
  topPlayers: CountedPlayer[];
  tournaments: string[];
}

export interface StandingEntry {
  teamName: string;
  owner: string;
  rank: number;
  totalScore: number;
  weeksCounted: number;
  weeklyBreakdown: WeeklyBreakdown[];
}

export interface SeasonState {
  currentWeek: number;
  standings: StandingEntry[];
  processedEventIds: string[];
  lastUpdated: string | null;
}

export interface PlayerWeekScore {
  player: Player;
  weekScore: number;
  tournamentsPlayed: number;
  entries: WeeklyScoreEntry[];
}

export interface TeamWeekResult {
  teamName: string;
  teamWeekScore: number;
  playersWhoPlayed: number;
  selected: PlayerWeekScore[];
}

export interface WeekSummary {
  week: number;
  tournaments: string[];
  eventIds: string[];
  teams: TeamWeekResult[];
}
