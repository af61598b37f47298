import type { Express } from 'express';
import { z } from 'zod';

import type { LeagueAuth } from '../auth.js';
import type { AppConfig } from '../config.js';
import type { ScheduleSource } from '../league/schedule-file.js';
import { runWeeklyUpdate } from '../league/update.js';
import type { UpdateDeps, UpdateReport } from '../league/update.js';
import type { ResultsProvider } from '../providers/types.js';
import type { LeagueStore } from '../store/index.js';

const UpdateRequestSchema = z.object({
  dry_run: z.boolean().optional(),
  days_back: z.number().int().min(1).max(366).optional(),
});

interface UpdateRouteDeps {
  store: LeagueStore;
  schedule: ScheduleSource;
  provider: ResultsProvider;
  auth: LeagueAuth;
  update: AppConfig['update'];
  division: string;
  now: () => Date;
  sleep?: UpdateDeps['sleep'];
}

export const toUpdateResponse = (report: UpdateReport) => ({
  dry_run: report.dryRun,
  applied: report.week !== null,
  week: report.week,
  current_week: report.currentWeek,
  window: report.window,
  scored: report.scored.map((item) => ({
    tournament: item.tournament,
    event_id: item.eventId,
    results: item.results,
  })),
  skipped: report.skipped.map((item) => ({
    tournament: item.tournament,
    event_id: item.eventId,
    reason: item.reason,
    message: item.message ?? null,
  })),
  teams: report.teams.map((team) => ({
    team_name: team.teamName,
    week_score: team.teamWeekScore,
    top_3_players: team.players,
  })),
  standings: report.standings.map((entry) => ({
    rank: entry.rank,
    team_name: entry.teamName,
    owner: entry.owner,
    total_score: entry.totalScore,
    weeks_counted: entry.weeksCounted,
  })),
});

export const registerUpdateRoutes = (app: Express, deps: UpdateRouteDeps) => {
  const { auth } = deps;
  let inFlight = false;

  app.post('/v1/updates', auth.requireAuth, auth.requireScope('league:write'), async (req, res, next) => {
    const parsed = UpdateRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    if (inFlight) {
      return res.status(409).send({ error: 'update_in_progress', message: 'A weekly update is already running.' });
    }

    inFlight = true;
    try {
      const now = deps.now();
      const schedule = await deps.schedule(now);
      const report = await runWeeklyUpdate(
        {
          store: deps.store,
          provider: deps.provider,
          schedule,
          ...(deps.sleep ? { sleep: deps.sleep } : {}),
        },
        {
          now,
          daysBack: parsed.data.days_back ?? deps.update.daysBack,
          requestDelayMs: deps.update.requestDelayMs,
          division: deps.division,
          dryRun: parsed.data.dry_run ?? false,
        }
      );
      return res.status(report.week === null ? 200 : 201).send(toUpdateResponse(report));
    } catch (err) {
      return next(err);
    } finally {
      inFlight = false;
    }
  });
};
