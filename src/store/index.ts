import type { LeagueStore } from './types.js';
import { FileLeagueStore } from './file.js';
import { PostgresLeagueStore } from './postgres.js';

export * from './types.js';

let store: LeagueStore | null = null;

export const getStore = (options: { databaseUrl?: string; dataDir: string }): LeagueStore => {
  if (!store) {
    store = options.databaseUrl
      ? new PostgresLeagueStore({ connectionString: options.databaseUrl })
      : new FileLeagueStore(options.dataDir);
  }
  return store;
};
