import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import { AuthorizationError, createAuth } from './auth.js';
import type { AppConfig } from './config.js';
import { WeekBatchError } from './engine/errors.js';
import type { ResultsProvider } from './providers/types.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerLeagueRoutes } from './routes/league.js';
import { registerUpdateRoutes } from './routes/updates.js';
import type { ScheduleSource } from './league/schedule-file.js';
import type { UpdateDeps } from './league/update.js';
import type { LeagueStore } from './store/index.js';
import { StoreError } from './store/index.js';

const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const payload = serializeError(err);
  if (payload.log) {
    // eslint-disable-next-line no-console
    console.error(payload.log.context, payload.log.error);
  }

  res.status(payload.status).json(payload.body);
};

const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof StoreError) {
    return {
      status: 503,
      body: {
        error: 'store_unavailable',
        code: err.code,
        message: err.message,
        ...(err.context.document ? { document: err.context.document } : {}),
      },
      log: { error: err, context: 'store_error' },
    };
  }

  if (err instanceof WeekBatchError) {
    return {
      status: 409,
      body: {
        error: err.code,
        message: err.message,
        ...(err.context.eventIds?.length ? { event_ids: err.context.eventIds } : {}),
      },
    };
  }

  if (err instanceof AuthorizationError) {
    return { status: err.status, body: { error: err.code, message: err.message } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export interface AppDeps {
  store: LeagueStore;
  schedule: ScheduleSource;
  provider: ResultsProvider;
  config: AppConfig;
  now?: () => Date;
  sleep?: UpdateDeps['sleep'];
}

export const createApp = (deps: AppDeps): Express => {
  const { store, schedule, provider, config } = deps;
  const now = deps.now ?? (() => new Date());
  const app = express();
  app.use(express.json());

  registerHealthRoutes(app, { schedule, now });
  registerLeagueRoutes(app, { store, schedule, now });
  registerUpdateRoutes(app, {
    store,
    schedule,
    provider,
    auth: createAuth(config.auth),
    update: config.update,
    division: config.results.division,
    now,
    sleep: deps.sleep,
  });

  app.use(errorHandler);

  return app;
};
