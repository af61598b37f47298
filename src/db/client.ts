import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';

let pool: Pool | undefined;

export const getPool = (connectionString = process.env.DATABASE_URL) => {
  if (!pool) {
    if (!connectionString) throw new Error('DATABASE_URL is not set');
    pool = new Pool({ connectionString });
  }
  return pool;
};

export const getDb = (connectionString?: string) => drizzle(getPool(connectionString));

export type Db = ReturnType<typeof getDb>;

export const closePool = async () => {
  if (!pool) return;
  const current = pool;
  pool = undefined;
  await current.end();
};
