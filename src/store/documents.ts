import { z } from 'zod';

export const WeeklyScoreSchema = z.object({
  week: z.number().int().min(1),
  tournament: z.string(),
  placement: z.number().int().min(1),
  score: z.number(),
  tier: z.string(),
  counted: z.boolean(),
});

export const RosterPlayerSchema = z.object({
  name: z.string().min(1),
  pdga_number: z.number().int().positive(),
  is_underdog: z.boolean().default(false),
  season_total: z.number().min(0).default(0),
  times_counted: z.number().int().min(0).default(0),
  tournaments_played: z.number().int().min(0).default(0),
  weekly_scores: z.array(WeeklyScoreSchema).default([]),
});

export const RosterTeamSchema = z.object({
  team_name: z.string().min(1),
  owner: z.string(),
  players: z.array(RosterPlayerSchema),
});

export const RostersDocumentSchema = z.object({
  teams: z.array(RosterTeamSchema),
});

export const CountedPlayerSchema = z.object({
  name: z.string(),
  score: z.number(),
  tournaments: z.number().int().min(0),
});

export const WeeklyBreakdownSchema = z.object({
  week: z.number().int().min(1),
  score: z.number(),
  top_3_players: z.array(CountedPlayerSchema),
  tournaments: z.array(z.string()).default([]),
});

export const StandingSchema = z.object({
  team_name: z.string().min(1),
  owner: z.string().default(''),
  rank: z.number().int().min(0).default(0),
  total_score: z.number().default(0),
  weeks_counted: z.number().int().min(0).default(0),
  weekly_breakdown: z.array(WeeklyBreakdownSchema).default([]),
});

export const StandingsDocumentSchema = z.object({
  current_week: z.number().int().min(0),
  last_updated: z.string().nullable().default(null),
  processed_events: z.array(z.string()).default([]),
  standings: z.array(StandingSchema),
});

export const FantasyResultSchema = z.object({
  player: z.string(),
  team: z.string().default(''),
  finish: z.string(),
  points: z.number(),
});

export const HistoryEntrySchema = z.object({
  name: z.string(),
  event_id: z.string().nullable().default(null),
  date: z.string().nullable(),
  location: z.string(),
  tier: z.string(),
  fantasy_results: z.array(FantasyResultSchema),
});

export const TournamentHistoryDocumentSchema = z.object({
  tournaments: z.array(HistoryEntrySchema),
});

export const PlayerStatSchema = z.object({
  name: z.string(),
  pdga_number: z.number().int(),
  team: z.string(),
  owner: z.string(),
  is_underdog: z.boolean(),
  season_total: z.number(),
  tournaments_played: z.number().int(),
  times_counted: z.number().int(),
  average_when_counted: z.number(),
});

export const PlayerStatsDocumentSchema = z.object({
  last_updated: z.string().nullable().default(null),
  player_stats: z.array(PlayerStatSchema),
});

export type RostersDocument = z.infer<typeof RostersDocumentSchema>;
export type StandingsDocument = z.infer<typeof StandingsDocumentSchema>;
export type TournamentHistoryDocument = z.infer<typeof TournamentHistoryDocumentSchema>;
export type PlayerStatsDocument = z.infer<typeof PlayerStatsDocumentSchema>;

export interface LeagueDocuments {
  rosters: RostersDocument;
  standings: StandingsDocument;
  tournament_history: TournamentHistoryDocument;
  player_stats: PlayerStatsDocument;
}

export type DocumentName = keyof LeagueDocuments;

export const DOCUMENT_NAMES: DocumentName[] = ['rosters', 'standings', 'tournament_history', 'player_stats'];

export const documentParsers: { [K in DocumentName]: (raw: unknown) => LeagueDocuments[K] } = {
  rosters: (raw) => RostersDocumentSchema.parse(raw),
  standings: (raw) => StandingsDocumentSchema.parse(raw),
  tournament_history: (raw) => TournamentHistoryDocumentSchema.parse(raw),
  player_stats: (raw) => PlayerStatsDocumentSchema.parse(raw),
};
