import { test } from 'node:test';
import assert from 'node:assert/strict';
import jwt from 'jsonwebtoken';
import request from 'supertest';

import { mintToken } from '../../src/auth.js';
import type { EventRef, EventResults } from '../../src/providers/types.js';
import { createTestApp, textScheduleSource } from '../helpers/app.js';
import { rows } from '../helpers/fixtures.js';
import { FixtureProvider } from '../helpers/provider.js';

const AUTH_ENV = { AUTH_DISABLE: '0', AUTH_SHARED_SECRET: 'test-secret' };
const AUTH_CONFIG = { disabled: false, sharedSecret: 'test-secret' };

const seasonProvider = () =>
  new FixtureProvider(
    new Map([
      [
        '1001',
        rows([
          [1, 101],
          [3, 201],
        ]),
      ],
      ['1002', rows([[2, 102]])],
    ]),
    new Map([['Named Only Open', '1002']])
  );

const quietly = async <T>(run: () => Promise<T>) => {
  const { info, warn, error } = console;
  console.info = () => undefined;
  console.warn = () => undefined;
  console.error = () => undefined;
  try {
    return await run();
  } finally {
    Object.assign(console, { info, warn, error });
  }
};

test('applies a week and reports the standings', () =>
  quietly(async () => {
    const { app, store } = createTestApp({ provider: seasonProvider() });

    const res = await request(app).post('/v1/updates').send({});
    assert.equal(res.status, 201, res.text);
    assert.equal(res.body.applied, true);
    assert.equal(res.body.week, 1);
    assert.deepEqual(res.body.scored, [
      { tournament: 'Spring Classic', event_id: '1001', results: 2 },
      { tournament: 'Named Only Open', event_id: '1002', results: 1 },
    ]);
    assert.deepEqual(res.body.standings, [
      { rank: 1, team_name: 'Birdie Brigade', owner: 'Sam', total_score: 3, weeks_counted: 1 },
      { rank: 2, team_name: 'Chain Gang', owner: 'Alex', total_score: 4, weeks_counted: 1 },
    ]);
    assert.deepEqual(res.body.teams[0], {
      team_name: 'Chain Gang',
      week_score: 4,
      top_3_players: [
        { name: 'Ada', score: 1, tournaments: 1 },
        { name: 'Bo', score: 3, tournaments: 1 },
      ],
    });
    assert.equal(store.writes, 1);

    const again = await request(app).post('/v1/updates').send({});
    assert.equal(again.status, 200);
    assert.equal(again.body.applied, false);
    assert.equal(again.body.current_week, 1);
    assert.equal(store.writes, 1);
  }));

test('dry runs leave the store untouched', () =>
  quietly(async () => {
    const { app, store } = createTestApp({ provider: seasonProvider() });

    const res = await request(app).post('/v1/updates').send({ dry_run: true, days_back: 30 });
    assert.equal(res.status, 201);
    assert.equal(res.body.dry_run, true);
    assert.deepEqual(res.body.window, { from: '2025-04-20', to: '2025-05-20' });
    assert.equal(store.writes, 0);
  }));

test('each update reads the schedule as of its own clock', () =>
  quietly(async () => {
    let clock = new Date('2026-03-31T12:00:00.000Z');
    let scheduleText = '';
    const loadedAt: string[] = [];
    const source = textScheduleSource(() => scheduleText);
    const { app } = createTestApp({
      provider: new FixtureProvider(new Map([['1001', rows([[1, 101]])]])),
      schedule: async (now) => {
        loadedAt.push(now.toISOString());
        return source(now);
      },
      now: () => clock,
    });

    const empty = await request(app).post('/v1/updates').send({});
    assert.equal(empty.status, 200);
    assert.equal(empty.body.applied, false);

    scheduleText = 'Late March Open, ES, March 26 - 29, 1001\n';
    const listed = await request(app).get('/v1/schedule');
    assert.equal(listed.body.tournaments[0].start_date, '2027-03-26');

    clock = new Date('2026-04-02T12:00:00.000Z');
    const res = await request(app).post('/v1/updates').send({});
    assert.equal(res.status, 201, res.text);
    assert.equal(res.body.week, 1);
    assert.deepEqual(res.body.scored, [{ tournament: 'Late March Open', event_id: '1001', results: 1 }]);
    assert.deepEqual(loadedAt, ['2026-03-31T12:00:00.000Z', '2026-03-31T12:00:00.000Z', '2026-04-02T12:00:00.000Z']);
  }));

test('validates the request body', async () => {
  const { app } = createTestApp();
  const res = await request(app).post('/v1/updates').send({ days_back: 0 });
  assert.equal(res.status, 400);
  assert.equal(res.body.error, 'validation_error');
});

test('rejected batches answer 409 with the batch error code', () =>
  quietly(async () => {
    const provider = new FixtureProvider(new Map([['1001', rows([[0, 101]])]]));
    const { app, store } = createTestApp({ provider });

    const res = await request(app).post('/v1/updates').send({});
    assert.equal(res.status, 409);
    assert.equal(res.body.error, 'invalid_placement');
    assert.deepEqual(res.body.event_ids, ['1001']);
    assert.equal(store.writes, 0);
  }));

test('a second update while one is running answers 409', () =>
  quietly(async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    let entered: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      entered = () => resolve();
    });

    class SlowProvider extends FixtureProvider {
      override async fetchResults(ref: EventRef, division: string): Promise<EventResults> {
        entered();
        await gate;
        return super.fetchResults(ref, division);
      }
    }

    const { app } = createTestApp({ provider: new SlowProvider(new Map([['1001', rows([[1, 101]])]])) });

    const first = request(app)
      .post('/v1/updates')
      .send({})
      .then((res) => res);
    await started;

    const second = await request(app).post('/v1/updates').send({});
    assert.equal(second.status, 409);
    assert.equal(second.body.error, 'update_in_progress');

    release();
    const res = await first;
    assert.equal(res.status, 201);
  }));

test('requires a bearer token with the league:write scope when auth is enabled', async () => {
  const { app } = createTestApp({ provider: seasonProvider(), env: AUTH_ENV });

  const missing = await request(app).post('/v1/updates').send({ dry_run: true });
  assert.equal(missing.status, 401);
  assert.equal(missing.body.error, 'missing_token');

  const readOnly = mintToken(AUTH_CONFIG, { subject: 'viewer', scopes: ['league:read'] }).token;
  const forbidden = await request(app)
    .post('/v1/updates')
    .set('Authorization', `Bearer ${readOnly}`)
    .send({ dry_run: true });
  assert.equal(forbidden.status, 403);
  assert.deepEqual(forbidden.body, { error: 'insufficient_scope', required: 'league:write' });

  const wrongKey = jwt.sign({ sub: 'admin', scope: 'league:write' }, 'other-secret', { algorithm: 'HS256' });
  const invalid = await quietly(() =>
    request(app).post('/v1/updates').set('Authorization', `Bearer ${wrongKey}`).send({ dry_run: true })
  );
  assert.equal(invalid.status, 401);
  assert.equal(invalid.body.error, 'invalid_token');

  const writer = mintToken(AUTH_CONFIG, { subject: 'admin', scopes: ['league:read', 'league:write'] }).token;
  const allowed = await quietly(() =>
    request(app).post('/v1/updates').set('Authorization', `Bearer ${writer}`).send({ dry_run: true })
  );
  assert.equal(allowed.status, 201);
  assert.equal(allowed.body.dry_run, true);
});
