import type { DocumentName, LeagueDocuments, LeagueStore } from './types.js';
import { DOCUMENT_NAMES, StoreError, validateDocument } from './types.js';

type PartialDocuments = { [K in DocumentName]?: unknown };

export class MemoryLeagueStore implements LeagueStore {
  private documents: PartialDocuments;
  writes = 0;

  constructor(initial: PartialDocuments = {}) {
    this.documents = structuredClone(initial);
  }

  async readDocument<K extends DocumentName>(name: K): Promise<LeagueDocuments[K]> {
    const raw = this.documents[name];
    if (raw === undefined) {
      throw new StoreError(`document ${name} not found`, 'document_missing', { document: name });
    }
    return validateDocument(name, structuredClone(raw));
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
    const next: PartialDocuments = {};
    for (const name of DOCUMENT_NAMES) {
      next[name] = structuredClone(documents[name]);
    }
    this.documents = next;
    this.writes += 1;
  }

  /** Raw stored value, for assertions and corruption tests. */
  peek(name: DocumentName): unknown {
    return structuredClone(this.documents[name]);
  }
}
