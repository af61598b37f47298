import { z } from 'zod';

import { addDays, resolveDateRange } from './dates.js';
import { classifyTier, isUnmappedTier } from './tiers.js';
import type { Tournament } from './types.js';

export type ScheduleIssueKind = 'malformed_record' | 'unparsable_dates' | 'unmapped_tier';

export interface ScheduleIssue {
  record: number;
  kind: ScheduleIssueKind;
  message: string;
  fields: string[];
}

export interface ScheduleLoadOptions {
  now?: Date;
}

export interface ScheduleLoadResult {
  index: ScheduleIndex;
  withEventIds: number;
  issues: ScheduleIssue[];
}

const RequiredField = z.string().trim().min(1);

const ScheduleRecordSchema = z
  .tuple([RequiredField, RequiredField, RequiredField])
  .rest(z.string())
  .transform(([name, tierAbbreviation, datesRaw, eventId]) => ({
    name,
    tierAbbreviation,
    datesRaw,
    eventId: eventId?.trim() ? eventId.trim() : null,
  }));

/** Splits schedule text into field lists: one record per line, comma-separated. */
export const splitScheduleText = (text: string): string[][] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'))
    .map((line) => line.split(',').map((field) => field.trim()));

export class ScheduleIndex {
  private readonly tournaments: readonly Tournament[];

  private constructor(tournaments: Tournament[]) {
    this.tournaments = Object.freeze(tournaments.map((t) => Object.freeze(t)));
  }

  static load(records: ReadonlyArray<ReadonlyArray<string>>, options: ScheduleLoadOptions = {}): ScheduleLoadResult {
    const now = options.now ?? new Date();
    const tournaments: Tournament[] = [];
    const issues: ScheduleIssue[] = [];

    records.forEach((fields, idx) => {
      const record = idx + 1;
      const parsed = ScheduleRecordSchema.safeParse([...fields]);
      if (!parsed.success) {
        issues.push({
          record,
          kind: 'malformed_record',
          message: 'expected name, tier and date range',
          fields: [...fields],
        });
        return;
      }

      const { name, tierAbbreviation, datesRaw, eventId } = parsed.data;
      const tier = classifyTier(tierAbbreviation);
      if (isUnmappedTier(tier)) {
        issues.push({
          record,
          kind: 'unmapped_tier',
          message: `unknown tier abbreviation ${tierAbbreviation}`,
          fields: [...fields],
        });
      }

      const range = resolveDateRange(datesRaw, now);
      if (!range) {
        issues.push({
          record,
          kind: 'unparsable_dates',
          message: `could not parse dates '${datesRaw}'`,
          fields: [...fields],
        });
      }

      tournaments.push({
        name,
        tierAbbreviation,
        tier,
        datesRaw,
        startDate: range?.start ?? null,
        endDate: range?.end ?? null,
        eventId,
      });
    });

    const index = new ScheduleIndex(tournaments);
    return { index, withEventIds: index.withEventIds().length, issues };
  }

  static fromText(text: string, options: ScheduleLoadOptions = {}): ScheduleLoadResult {
    return ScheduleIndex.load(splitScheduleText(text), options);
  }

  static empty(): ScheduleIndex {
    return new ScheduleIndex([]);
  }

  get size() {
    return this.tournaments.length;
  }

  all(): readonly Tournament[] {
    return this.tournaments;
  }

  findByName(query: string): Tournament | null {
    const needle = query.trim().toLowerCase();
    if (!needle) return null;
    return this.tournaments.find((t) => t.name.toLowerCase().includes(needle)) ?? null;
  }

  findByEventId(eventId: string | number): Tournament | null {
    const id = String(eventId);
    return this.tournaments.find((t) => t.eventId === id) ?? null;
  }

  getInRange(start: Date, end: Date): Tournament[] {
    return this.tournaments.filter(
      (t) =>
        t.startDate !== null &&
        t.endDate !== null &&
        t.startDate.getTime() <= end.getTime() &&
        t.endDate.getTime() >= start.getTime()
    );
  }

  withEventIds(): Tournament[] {
    return this.tournaments.filter((t) => t.eventId !== null);
  }

  withoutEventIds(): Tournament[] {
    return this.tournaments.filter((t) => t.eventId === null);
  }

  upcoming(daysAhead: number, now: Date = new Date()): Tournament[] {
    const horizon = addDays(now, daysAhead).getTime();
    return this.sortedByStart().filter(
      (t) => t.startDate !== null && t.startDate.getTime() >= now.getTime() && t.startDate.getTime() <= horizon
    );
  }

  sortedByStart(): Tournament[] {
    const resolved = this.tournaments.filter((t) => t.startDate !== null);
    const unresolved = this.tournaments.filter((t) => t.startDate === null);
    resolved.sort((a, b) => (a.startDate?.getTime() ?? 0) - (b.startDate?.getTime() ?? 0));
    return [...resolved, ...unresolved];
  }
}
