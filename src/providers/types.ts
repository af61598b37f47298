import type { ResultRow } from '../engine/types.js';

export interface EventRef {
  eventId: string;
  url: string;
}

export interface EventQuery {
  name: string;
  eventId: string | null;
}

export interface EventResults {
  eventId: string;
  name: string;
  division: string;
  url: string;
  results: ResultRow[];
}

export interface ResultsProvider {
  /** Null when the provider has no event matching the query. */
  findEvent(query: EventQuery): Promise<EventRef | null>;
  fetchResults(ref: EventRef, division: string): Promise<EventResults>;
}

export type ProviderErrorCode =
  | 'http_error'
  | 'division_not_found'
  | 'results_table_not_found';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly context: { url?: string; status?: number; division?: string } = {}
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}
