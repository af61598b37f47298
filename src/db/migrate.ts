import 'dotenv/config';
import { readdir, readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';

import { closePool, getPool } from './client.js';

const MIGRATIONS_DIR = fileURLToPath(new URL('../../drizzle/', import.meta.url));
const MIGRATIONS_TABLE = '__league_migrations';

const ensureTableSQL = `
CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
  id SERIAL PRIMARY KEY,
  name TEXT NOT NULL UNIQUE,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const parsePositiveInteger = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const RETRY_ATTEMPTS = parsePositiveInteger(process.env.DB_MIGRATE_RETRIES, 10);
const RETRY_DELAY_MS = parsePositiveInteger(process.env.DB_MIGRATE_RETRY_DELAY_MS, 2_000);

const connectWithRetry = async (pool: Pool): Promise<PoolClient> => {
  let lastError: unknown;
  for (let attempt = 1; attempt <= RETRY_ATTEMPTS; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      lastError = err;
      if (attempt === RETRY_ATTEMPTS) break;
      const waitMs = RETRY_DELAY_MS * attempt;
      console.warn('db_connect_retry', {
        attempt,
        attempts: RETRY_ATTEMPTS,
        delayMs: waitMs,
        message: err instanceof Error ? err.message : String(err),
      });
      await delay(waitMs);
    }
  }
  throw lastError instanceof Error ? lastError : new Error('Failed to acquire database connection');
};

const listPending = async (client: PoolClient) => {
  const result = await client.query<{ name: string }>(`SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY name`);
  const applied = new Set(result.rows.map((row) => row.name));
  const files = (await readdir(MIGRATIONS_DIR)).filter((file) => file.endsWith('.sql')).sort();
  return files.filter((file) => !applied.has(file));
};

async function main() {
  const client = await connectWithRetry(getPool());
  try {
    await client.query(ensureTableSQL);

    for (const file of await listPending(client)) {
      const sql = await readFile(`${MIGRATIONS_DIR}${file}`, 'utf8');
      console.log(`Applying migration ${file}`);
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query(`INSERT INTO ${MIGRATIONS_TABLE} (name) VALUES ($1)`, [file]);
        await client.query('COMMIT');
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    }

    console.log('League migrations up to date');
  } finally {
    client.release();
    await closePool();
  }
}

main().catch((err) => {
  console.error('migrate_failed', err);
  process.exitCode = 1;
});
