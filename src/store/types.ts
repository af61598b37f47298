import { ZodError } from 'zod';

import { documentParsers } from './documents.js';
import type { DocumentName, LeagueDocuments } from './documents.js';
import { StoreError } from './errors.js';

export * from './documents.js';
export { StoreError } from './errors.js';
export type { StoreErrorCode } from './errors.js';

/**
 * Persisted league state. Each document is read in full at the start of a run
 * and written in full at the end; there is a single writer per run.
 */
export interface LeagueStore {
  readDocuments(): Promise<LeagueDocuments>;
  readDocument<K extends DocumentName>(name: K): Promise<LeagueDocuments[K]>;
  writeDocuments(documents: LeagueDocuments): Promise<void>;
}

export const validateDocument = <K extends DocumentName>(name: K, raw: unknown): LeagueDocuments[K] => {
  try {
    return documentParsers[name](raw);
  } catch (err) {
    if (err instanceof ZodError) {
      const issue = err.issues[0];
      const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
      throw new StoreError(`document ${name} failed validation${where}: ${issue?.message ?? 'invalid'}`, 'document_invalid', {
        document: name,
        cause: err,
      });
    }
    throw err;
  }
};
