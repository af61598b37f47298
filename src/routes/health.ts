import type { Express } from 'express';

import type { ScheduleSource } from '../league/schedule-file.js';

export const registerHealthRoutes = (app: Express, deps: { schedule: ScheduleSource; now: () => Date }) => {
  app.get('/health', async (_req, res, next) => {
    try {
      const schedule = await deps.schedule(deps.now());
      return res.status(200).send({ ok: true, tournaments: schedule.size });
    } catch (err) {
      return next(err);
    }
  });
};
