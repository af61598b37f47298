import { readFile } from 'node:fs/promises';

import { ScheduleIndex } from '../engine/schedule.js';
import type { ScheduleLoadResult } from '../engine/schedule.js';
import type { Logger } from './update.js';

const isMissingFile = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

/**
 * Reads the season schedule from disk. A missing file yields an empty
 * schedule; record-level problems are logged and returned as issues.
 */
export async function loadScheduleFile(
  path: string,
  options: { now?: Date; logger?: Logger } = {}
): Promise<ScheduleLoadResult> {
  const logger = options.logger ?? console;

  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      logger.warn('schedule_file_missing', { path });
      return { index: ScheduleIndex.empty(), withEventIds: 0, issues: [] };
    }
    throw err;
  }

  const result = ScheduleIndex.fromText(text, { now: options.now });
  for (const issue of result.issues) {
    logger.warn('schedule_record_issue', { path, record: issue.record, kind: issue.kind, message: issue.message });
  }
  logger.info('schedule_loaded', { path, tournaments: result.index.size, withEventIds: result.withEventIds });
  return result;
}

/** Builds the schedule for a given moment; called once per run or request. */
export type ScheduleSource = (now: Date) => Promise<ScheduleIndex>;

/** Re-reads the schedule file on every call so edits and year rollover follow the run's clock. */
export const scheduleFileSource =
  (path: string, logger?: Logger): ScheduleSource =>
  async (now) =>
    (await loadScheduleFile(path, { now, logger })).index;
