import { test } from 'node:test';
import assert from 'node:assert/strict';

import { ScheduleIndex, splitScheduleText } from '../../src/engine/schedule.js';
import { formatIsoDay } from '../../src/engine/dates.js';
import { utc } from '../helpers/fixtures.js';

const scheduleText = `# season schedule
Supreme Flight Open, ES, February 27 - March 1, 88276
Big Easy Open, esp, March 14 - 16

Champions Cup, M, May 1 - 4, 88280
Broken Line, ES
Mystery Open, XYZ, June 5 - 8
Undated Classic, ES, TBD, 99999
`;

const load = () => ScheduleIndex.fromText(scheduleText, { now: utc(2025, 6, 15) });

test('splits one record per line and drops comments and blank lines', () => {
  assert.deepEqual(splitScheduleText('# header\n\nA, ES, May 1 - 4\r\n  B , M , June 2 - 5 , 12 \n'), [
    ['A', 'ES', 'May 1 - 4'],
    ['B', 'M', 'June 2 - 5', '12'],
  ]);
});

test('loads tournaments and reports record issues without failing', () => {
  const { index, withEventIds, issues } = load();

  assert.equal(index.size, 5);
  assert.equal(withEventIds, 3);
  assert.deepEqual(
    issues.map((issue) => [issue.record, issue.kind]),
    [
      [4, 'malformed_record'],
      [5, 'unmapped_tier'],
      [6, 'unparsable_dates'],
    ]
  );
  assert.deepEqual(issues[0]?.fields, ['Broken Line', 'ES']);
});

test('keeps unparsable tournaments with unset dates', () => {
  const undated = load().index.findByEventId('99999');
  assert.ok(undated);
  assert.equal(undated.startDate, null);
  assert.equal(undated.endDate, null);
});

test('rejects records with a blank required field', () => {
  const { index, issues } = ScheduleIndex.load([['Name', ' ', 'March 1 - 3']], { now: utc(2025, 6, 15) });
  assert.equal(index.size, 0);
  assert.equal(issues[0]?.kind, 'malformed_record');
});

test('looks tournaments up by name and event id', () => {
  const { index } = load();
  assert.equal(index.findByName('big easy')?.name, 'Big Easy Open');
  assert.equal(index.findByName('  '), null);
  assert.equal(index.findByName('Nowhere'), null);
  assert.equal(index.findByEventId(88280)?.name, 'Champions Cup');
  assert.equal(index.findByEventId('1'), null);
});

test('normalizes the tier but keeps the raw abbreviation', () => {
  const bigEasy = load().index.findByName('Big Easy Open');
  assert.ok(bigEasy);
  assert.equal(bigEasy.tierAbbreviation, 'esp');
  assert.equal(bigEasy.tier.abbreviation, 'ESP');
  assert.equal(bigEasy.tier.multiplier, 1.5);
  assert.equal(bigEasy.eventId, null);
});

test('returns tournaments overlapping a window in schedule order', () => {
  const { index } = load();
  assert.deepEqual(
    index.getInRange(utc(2025, 3, 1), utc(2025, 3, 14)).map((t) => t.name),
    ['Supreme Flight Open', 'Big Easy Open']
  );
  assert.deepEqual(index.getInRange(utc(2025, 3, 17), utc(2025, 4, 30)), []);
});

test('partitions by event id presence', () => {
  const { index } = load();
  assert.deepEqual(
    index.withEventIds().map((t) => t.eventId),
    ['88276', '88280', '99999']
  );
  assert.deepEqual(
    index.withoutEventIds().map((t) => t.name),
    ['Big Easy Open', 'Mystery Open']
  );
});

test('sorts by start date with unresolved dates last', () => {
  const { index } = load();
  assert.deepEqual(
    index.sortedByStart().map((t) => t.name),
    ['Supreme Flight Open', 'Big Easy Open', 'Champions Cup', 'Mystery Open', 'Undated Classic']
  );
  assert.deepEqual(
    index.upcoming(30, utc(2025, 6, 1)).map((t) => [t.name, t.startDate ? formatIsoDay(t.startDate) : null]),
    [['Mystery Open', '2025-06-05']]
  );
});

test('returns a frozen tournament list', () => {
  const { index } = load();
  assert.ok(Object.isFrozen(index.all()));
  assert.ok(Object.isFrozen(index.all()[0]));
  assert.equal(ScheduleIndex.empty().size, 0);
});
