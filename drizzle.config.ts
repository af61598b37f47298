import 'dotenv/config';
import type { Config } from 'drizzle-kit';

const config: Config = {
  schema: './src/db/schema.ts',
  out: './drizzle',
  driver: 'pg',
  dbCredentials: {
    connectionString: process.env.DATABASE_URL ?? 'postgres://localhost:5432/league',
  },
  tablesFilter: ['league_documents'],
};

export default config;
