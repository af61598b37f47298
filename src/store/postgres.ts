import { eq } from 'drizzle-orm';

import { getDb, type Db } from '../db/client.js';
import { leagueDocuments } from '../db/schema.js';
import type { DocumentName, LeagueDocuments, LeagueStore } from './types.js';
import { DOCUMENT_NAMES, StoreError, validateDocument } from './types.js';

/** One `league_documents` row per document, body stored as jsonb. */
export class PostgresLeagueStore implements LeagueStore {
  private readonly db: Db;
  private readonly now: () => Date;

  constructor(options: { db?: Db; connectionString?: string; now?: () => Date } = {}) {
    this.db = options.db ?? getDb(options.connectionString);
    this.now = options.now ?? (() => new Date());
  }

  async readDocument<K extends DocumentName>(name: K): Promise<LeagueDocuments[K]> {
    let rows: Array<{ body: unknown }>;
    try {
      rows = await this.db
        .select({ body: leagueDocuments.body })
        .from(leagueDocuments)
        .where(eq(leagueDocuments.name, name))
        .limit(1);
    } catch (err) {
      throw new StoreError(`document ${name} could not be read`, 'document_corrupt', { document: name, cause: err });
    }

    const row = rows[0];
    if (!row) {
      throw new StoreError(`document ${name} not found`, 'document_missing', { document: name });
    }
    return validateDocument(name, row.body);
  }

  async readDocuments(): Promise<LeagueDocuments> {
    const rosters = await this.readDocument('rosters');
    const standings = await this.readDocument('standings');
    const tournamentHistory = await this.readDocument('tournament_history');
    const playerStats = await this.readDocument('player_stats');
    return { rosters, standings, tournament_history: tournamentHistory, player_stats: playerStats };
  }

  async writeDocuments(documents: LeagueDocuments): Promise<void> {
    const updatedAt = this.now();
    try {
      await this.db.transaction(async (tx) => {
        for (const name of DOCUMENT_NAMES) {
          await tx
            .insert(leagueDocuments)
            .values({ name, body: documents[name], updatedAt })
            .onConflictDoUpdate({
              target: leagueDocuments.name,
              set: { body: documents[name], updatedAt },
            });
        }
      });
    } catch (err) {
      throw new StoreError('failed to write league documents', 'write_failed', { cause: err });
    }
  }
}
