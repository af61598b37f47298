import type { Express } from 'express';
import { z } from 'zod';

import { formatIsoDay } from '../engine/dates.js';
import { buildPlayerStats, filterPlayerStats } from '../engine/player-stats.js';
import type { Tournament } from '../engine/types.js';
import { playerStatLineToDocument, teamsFromRosters } from '../league/documents.js';
import type { ScheduleSource } from '../league/schedule-file.js';
import type { LeagueStore } from '../store/index.js';

const ScheduleQuerySchema = z.object({
  event_ids: z.enum(['with', 'without']).optional(),
});

const PlayerStatsQuerySchema = z.object({
  filter: z.enum(['all', 'counted', 'underdogs']).default('all'),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

interface LeagueRouteDeps {
  store: LeagueStore;
  schedule: ScheduleSource;
  now: () => Date;
}

export const toTournamentResponse = (tournament: Tournament) => ({
  name: tournament.name,
  tier: tournament.tierAbbreviation,
  tier_name: tournament.tier.name,
  tier_label: tournament.tier.label,
  multiplier: tournament.tier.multiplier,
  dates: tournament.datesRaw,
  start_date: tournament.startDate ? formatIsoDay(tournament.startDate) : null,
  end_date: tournament.endDate ? formatIsoDay(tournament.endDate) : null,
  event_id: tournament.eventId,
});

export const registerLeagueRoutes = (app: Express, deps: LeagueRouteDeps) => {
  const { store } = deps;

  app.get('/v1/schedule', async (req, res, next) => {
    const parsed = ScheduleQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const schedule = await deps.schedule(deps.now());
      const tournaments =
        parsed.data.event_ids === 'with'
          ? schedule.withEventIds()
          : parsed.data.event_ids === 'without'
            ? schedule.withoutEventIds()
            : schedule.all();

      return res.send({
        total: schedule.size,
        with_event_ids: schedule.withEventIds().length,
        tournaments: tournaments.map(toTournamentResponse),
      });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/standings', async (_req, res, next) => {
    try {
      const standings = await store.readDocument('standings');
      return res.send(standings);
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/rosters', async (_req, res, next) => {
    try {
      const rosters = await store.readDocument('rosters');
      return res.send(rosters);
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/tournaments/recent', async (_req, res, next) => {
    try {
      const history = await store.readDocument('tournament_history');
      return res.send({ tournaments: [...history.tournaments].reverse() });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/player-stats', async (req, res, next) => {
    const parsed = PlayerStatsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const rosters = await store.readDocument('rosters');
      const lines = filterPlayerStats(buildPlayerStats(teamsFromRosters(rosters)), parsed.data.filter);
      const limited = parsed.data.limit ? lines.slice(0, parsed.data.limit) : lines;
      return res.send({
        filter: parsed.data.filter,
        players: limited.map(playerStatLineToDocument),
      });
    } catch (err) {
      return next(err);
    }
  });
};
