import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadScheduleFile, scheduleFileSource } from '../../src/league/schedule-file.js';
import type { Logger } from '../../src/league/update.js';
import { utc } from '../helpers/fixtures.js';

const quietLogger = () => {
  const warnings: string[] = [];
  const logger: Logger = {
    info: () => undefined,
    warn: (event: unknown) => warnings.push(String(event)),
    error: () => undefined,
  };
  return { warnings, logger };
};

test('loads the bundled season schedule', async () => {
  const { warnings, logger } = quietLogger();
  const path = fileURLToPath(new URL('../../data/tournaments.txt', import.meta.url));
  const { index, withEventIds, issues } = await loadScheduleFile(path, { now: utc(2025, 6, 15), logger });

  assert.equal(index.size, 7);
  assert.equal(withEventIds, 4);
  assert.deepEqual(issues, []);
  assert.deepEqual(warnings, []);
  assert.equal(index.findByEventId('88280')?.tier.name, 'Major');
});

test('treats a missing schedule file as an empty season', async () => {
  const { warnings, logger } = quietLogger();
  const { index, issues } = await loadScheduleFile('/nonexistent/league/tournaments.txt', { logger });

  assert.equal(index.size, 0);
  assert.deepEqual(issues, []);
  assert.deepEqual(warnings, ['schedule_file_missing']);
});

test('the file source picks up edits between runs', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'league-schedule-'));
  try {
    const path = join(dir, 'tournaments.txt');
    const { logger } = quietLogger();
    const source = scheduleFileSource(path, logger);

    await writeFile(path, 'Spring Classic, ES, May 8 - 11\n', 'utf8');
    const before = await source(utc(2025, 6, 15));
    assert.equal(before.withEventIds().length, 0);

    await writeFile(path, 'Spring Classic, ES, May 8 - 11, 1001\n', 'utf8');
    const after = await source(utc(2025, 6, 15));
    assert.equal(after.findByEventId('1001')?.name, 'Spring Classic');
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
