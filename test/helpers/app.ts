import { createApp } from '../../src/app.js';
import { loadConfig } from '../../src/config.js';
import { ScheduleIndex } from '../../src/engine/schedule.js';
import type { ScheduleSource } from '../../src/league/schedule-file.js';
import type { ResultsProvider } from '../../src/providers/types.js';
import { MemoryLeagueStore } from '../../src/store/memory.js';
import { leagueDocuments } from './fixtures.js';
import { FixtureProvider } from './provider.js';

export const TEST_NOW = new Date('2025-05-20T18:00:00.000Z');

export const TEST_SCHEDULE = `Spring Classic, ES, May 8 - 11, 1001
Named Only Open, ESP, May 9 - 11
Champions Cup, M, June 5 - 8, 1005
`;

/** Parses the given text afresh for every run, like the schedule file source. */
export const textScheduleSource =
  (text: () => string): ScheduleSource =>
  async (now) =>
    ScheduleIndex.fromText(text(), { now }).index;

interface TestAppOptions {
  store?: MemoryLeagueStore;
  provider?: ResultsProvider;
  schedule?: ScheduleSource;
  now?: () => Date;
  env?: NodeJS.ProcessEnv;
}

export const createTestApp = (options: TestAppOptions = {}) => {
  const store = options.store ?? new MemoryLeagueStore(leagueDocuments());
  const provider = options.provider ?? new FixtureProvider(new Map());
  const schedule = options.schedule ?? textScheduleSource(() => TEST_SCHEDULE);
  const config = loadConfig({ NODE_ENV: 'test', AUTH_DISABLE: '1', ...options.env });
  const app = createApp({
    store,
    schedule,
    provider,
    config,
    now: options.now ?? (() => TEST_NOW),
    sleep: async () => undefined,
  });
  return { app, store, provider };
};
