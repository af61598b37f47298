import type { ResultRow } from '../../src/engine/types.js';
import type { EventQuery, EventRef, EventResults, ResultsProvider } from '../../src/providers/types.js';

/** Results provider backed by in-memory fixtures; records every call. */
export class FixtureProvider implements ResultsProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly events: Map<string, ResultRow[] | Error>,
    private readonly searchIndex: Map<string, string> = new Map()
  ) {}

  async findEvent(query: EventQuery): Promise<EventRef | null> {
    this.calls.push(`find:${query.eventId ?? query.name}`);
    const eventId = query.eventId ?? this.searchIndex.get(query.name) ?? null;
    return eventId ? { eventId, url: `fixture://event/${eventId}` } : null;
  }

  async fetchResults(ref: EventRef, division: string): Promise<EventResults> {
    this.calls.push(`fetch:${ref.eventId}`);
    const entry = this.events.get(ref.eventId);
    if (entry instanceof Error) throw entry;
    return { eventId: ref.eventId, name: `Event ${ref.eventId}`, division, url: ref.url, results: entry ?? [] };
  }
}
