import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { DocumentName, LeagueDocuments, LeagueStore } from './types.js';
import { DOCUMENT_NAMES, StoreError, validateDocument } from './types.js';

export const DOCUMENT_FILES: Record<DocumentName, string> = {
  rosters: 'rosters.json',
  standings: 'standings.json',
  tournament_history: 'recent_tournaments.json',
  player_stats: 'player_stats.json',
};

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

/** League documents as pretty-printed JSON files in one directory. */
export class FileLeagueStore implements LeagueStore {
  constructor(private readonly dataDir: string) {}

  pathFor(name: DocumentName) {
    return join(this.dataDir, DOCUMENT_FILES[name]);
  }

  async readDocument<K extends DocumentName>(name: K): Promise<LeagueDocuments[K]> {
    const path = this.pathFor(name);

    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw new StoreError(`document ${name} not found at ${path}`, 'document_missing', { document: name, cause: err });
      }
      throw new StoreError(`document ${name} could not be read from ${path}`, 'document_corrupt', {
        document: name,
        cause: err,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new StoreError(`document ${name} at ${path} is not valid JSON`, 'document_corrupt', {
        document: name,
        cause: err,
      });
    }

    return validateDocument(name, raw);
  }

  async readDocuments(): Promise<LeagueDocuments> {
    const [rosters, standings, tournamentHistory, playerStats] = await Promise.all([
      this.readDocument('rosters'),
      this.readDocument('standings'),
      this.readDocument('tournament_history'),
      this.readDocument('player_stats'),
    ]);
    return { rosters, standings, tournament_history: tournamentHistory, player_stats: playerStats };
  }

  async writeDocuments(documents: LeagueDocuments): Promise<void> {
    try {
      await mkdir(this.dataDir, { recursive: true });
      // Every file is staged before any is replaced.
      const staged: Array<{ tmp: string; target: string }> = [];
      for (const name of DOCUMENT_NAMES) {
        const target = this.pathFor(name);
        const tmp = `${target}.tmp`;
        await writeFile(tmp, `${JSON.stringify(documents[name], null, 2)}\n`, 'utf8');
        staged.push({ tmp, target });
      }
      for (const { tmp, target } of staged) {
        await rename(tmp, target);
      }
    } catch (err) {
      throw new StoreError(`failed to write league documents to ${this.dataDir}`, 'write_failed', { cause: err });
    }
  }
}
