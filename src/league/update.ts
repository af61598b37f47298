import { setTimeout as delay } from 'node:timers/promises';

import { addDays, formatIsoDay } from '../engine/dates.js';
import { appendTournamentHistory } from '../engine/history.js';
import { P } from '../engine/params.js';
import { buildPlayerStats } from '../engine/player-stats.js';
import type { ScheduleIndex } from '../engine/schedule.js';
import { applyWeek } from '../engine/scoring.js';
import { nextWeek, recordWeek } from '../engine/standings.js';
import type { CountedPlayer, StandingEntry, Tournament, TournamentResults } from '../engine/types.js';
import type { ResultsProvider } from '../providers/types.js';
import { ProviderError } from '../providers/types.js';
import type { LeagueDocuments, LeagueStore } from '../store/index.js';
import {
  historyFromDocument,
  historyToDocument,
  playerStatsToDocument,
  rostersFromTeams,
  seasonFromStandings,
  standingsFromSeason,
  teamsFromRosters,
} from './documents.js';

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface UpdateDeps {
  store: LeagueStore;
  provider: ResultsProvider;
  schedule: ScheduleIndex;
  logger?: Logger;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface UpdateOptions {
  now?: Date;
  daysBack?: number;
  division?: string;
  requestDelayMs?: number;
  dryRun?: boolean;
}

export type SkipReason = 'not_finished' | 'already_processed' | 'not_found' | 'provider_error' | 'no_results';

export interface SkippedTournament {
  tournament: string;
  eventId: string | null;
  reason: SkipReason;
  message?: string;
}

export interface UpdateReport {
  dryRun: boolean;
  week: number | null;
  currentWeek: number;
  window: { from: string; to: string };
  scored: Array<{ tournament: string; eventId: string; results: number }>;
  skipped: SkippedTournament[];
  teams: Array<{ teamName: string; teamWeekScore: number; players: CountedPlayer[] }>;
  standings: StandingEntry[];
}

interface CollectContext {
  provider: ResultsProvider;
  logger: Logger;
  sleep: (ms: number) => Promise<unknown>;
  division: string;
  requestDelayMs: number;
  processed: Set<string>;
}

type Collected =
  | { ok: true; item: TournamentResults }
  | { ok: false; skipped: SkippedTournament };

const skip = (tournament: Tournament, reason: SkipReason, eventId: string | null, message?: string): Collected => ({
  ok: false,
  skipped: { tournament: tournament.name, eventId, reason, ...(message ? { message } : {}) },
});

const collectTournament = async (tournament: Tournament, ctx: CollectContext): Promise<Collected> => {
  try {
    const ref = await ctx.provider.findEvent({ name: tournament.name, eventId: tournament.eventId });
    if (!ref) {
      ctx.logger.warn('tournament_not_found', { tournament: tournament.name });
      return skip(tournament, 'not_found', null);
    }
    if (ctx.processed.has(ref.eventId)) {
      return skip(tournament, 'already_processed', ref.eventId);
    }

    const fetched = await ctx.provider.fetchResults(ref, ctx.division);
    if (!fetched.results.length) {
      ctx.logger.warn('tournament_without_results', { tournament: tournament.name, eventId: ref.eventId });
      return skip(tournament, 'no_results', ref.eventId);
    }

    return {
      ok: true,
      item: { tournament, eventId: ref.eventId, division: fetched.division, results: fetched.results },
    };
  } catch (err) {
    if (err instanceof ProviderError) {
      ctx.logger.error('tournament_fetch_failed', { tournament: tournament.name, code: err.code, message: err.message });
      return skip(tournament, 'provider_error', tournament.eventId, err.message);
    }
    throw err;
  }
};

/**
 * Finished tournaments in the look-back window, fetched one at a time in
 * schedule order with a fixed pause between provider calls.
 */
export async function collectWeeklyBatch(
  schedule: ScheduleIndex,
  ctx: CollectContext,
  window: { from: Date; to: Date }
): Promise<{ batch: TournamentResults[]; skipped: SkippedTournament[] }> {
  const batch: TournamentResults[] = [];
  const skipped: SkippedTournament[] = [];
  let calls = 0;

  for (const tournament of schedule.getInRange(window.from, window.to)) {
    if (!tournament.endDate || tournament.endDate.getTime() >= window.to.getTime()) {
      skipped.push({ tournament: tournament.name, eventId: tournament.eventId, reason: 'not_finished' });
      continue;
    }

    if (tournament.eventId && ctx.processed.has(tournament.eventId)) {
      skipped.push({ tournament: tournament.name, eventId: tournament.eventId, reason: 'already_processed' });
      continue;
    }

    // Only tournaments that reach the provider count towards the pause.
    if (calls > 0 && ctx.requestDelayMs > 0) {
      await ctx.sleep(ctx.requestDelayMs);
    }
    calls += 1;

    const collected = await collectTournament(tournament, ctx);
    if (collected.ok) {
      batch.push(collected.item);
      ctx.processed.add(collected.item.eventId);
    } else {
      skipped.push(collected.skipped);
    }
  }

  return { batch, skipped };
}

/**
 * One weekly update: read every document, score the new finished tournaments
 * as a single week, and write every document back. Nothing is written when no
 * new tournament was scored or on a dry run.
 */
export async function runWeeklyUpdate(deps: UpdateDeps, options: UpdateOptions = {}): Promise<UpdateReport> {
  const logger = deps.logger ?? console;
  const now = options.now ?? new Date();
  const daysBack = options.daysBack ?? 14;
  const dryRun = options.dryRun ?? false;
  const window = { from: addDays(now, -daysBack), to: now };

  const documents = await deps.store.readDocuments();
  const teams = teamsFromRosters(documents.rosters);
  const season = seasonFromStandings(documents.standings);

  const { batch, skipped } = await collectWeeklyBatch(
    deps.schedule,
    {
      provider: deps.provider,
      logger,
      sleep: deps.sleep ?? ((ms) => delay(ms)),
      division: options.division ?? P.defaultDivision,
      requestDelayMs: options.requestDelayMs ?? 3_000,
      processed: new Set(season.processedEventIds),
    },
    window
  );

  const baseReport = {
    dryRun,
    window: { from: formatIsoDay(window.from), to: formatIsoDay(window.to) },
    skipped,
  };

  if (!batch.length) {
    logger.info('weekly_update_noop', { currentWeek: season.currentWeek, skipped: skipped.length });
    return {
      ...baseReport,
      week: null,
      currentWeek: season.currentWeek,
      scored: [],
      teams: [],
      standings: season.standings,
    };
  }

  const summary = applyWeek({
    week: nextWeek(season),
    batch,
    teams,
    processedEventIds: season.processedEventIds,
  });
  const nextSeason = recordWeek(season, summary, teams, now);
  const history = appendTournamentHistory(historyFromDocument(documents.tournament_history), batch, teams);

  const next: LeagueDocuments = {
    rosters: rostersFromTeams(teams),
    standings: standingsFromSeason(nextSeason),
    tournament_history: historyToDocument(history),
    player_stats: playerStatsToDocument(buildPlayerStats(teams), now),
  };

  if (!dryRun) {
    await deps.store.writeDocuments(next);
  }

  logger.info('weekly_update_applied', {
    week: summary.week,
    tournaments: summary.tournaments,
    dryRun,
  });

  return {
    ...baseReport,
    week: summary.week,
    currentWeek: nextSeason.currentWeek,
    scored: batch.map((item) => ({
      tournament: item.tournament.name,
      eventId: item.eventId,
      results: item.results.length,
    })),
    teams: summary.teams.map((team) => ({
      teamName: team.teamName,
      teamWeekScore: team.teamWeekScore,
      players: team.selected.map((pick) => ({
        name: pick.player.name,
        score: pick.weekScore,
        tournaments: pick.tournamentsPlayed,
      })),
    })),
    standings: nextSeason.standings,
  };
}
