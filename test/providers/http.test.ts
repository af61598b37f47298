import { test } from 'node:test';
import assert from 'node:assert/strict';

import { fetchHtml } from '../../src/providers/http.js';
import { ProviderError } from '../../src/providers/types.js';

test('retries failed responses and returns the page body', async () => {
  const statuses = [503, 200];
  const calls: string[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    calls.push(String(input));
    const status = statuses.shift() ?? 500;
    return new Response(status === 200 ? '<html>ok</html>' : 'unavailable', { status });
  };

  const html = await fetchHtml('https://example.test/tour/event/1', { fetchImpl, retries: 3, backoffMs: 0 });
  assert.equal(html, '<html>ok</html>');
  assert.deepEqual(calls, ['https://example.test/tour/event/1', 'https://example.test/tour/event/1']);
});

test('raises an http_error after the last attempt', async () => {
  let attempts = 0;
  const fetchImpl: typeof fetch = async () => {
    attempts += 1;
    return new Response('missing', { status: 404, statusText: 'Not Found' });
  };

  await assert.rejects(
    fetchHtml('https://example.test/tour/event/2', { fetchImpl, retries: 2, backoffMs: 0 }),
    (err: unknown) => {
      assert.ok(err instanceof ProviderError);
      assert.equal(err.code, 'http_error');
      assert.equal(err.context.status, 404);
      assert.equal(err.context.url, 'https://example.test/tour/event/2');
      return true;
    }
  );
  assert.equal(attempts, 2);
});
