import { setTimeout as delay } from 'node:timers/promises';

import { ProviderError } from './types.js';

export interface FetchHtmlOptions {
  retries?: number;
  timeoutMs?: number;
  backoffMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

export type HtmlFetcher = (url: string) => Promise<string>;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export async function fetchHtml(url: string, options: FetchHtmlOptions = {}): Promise<string> {
  const retries = Math.max(1, options.retries ?? 3);
  const timeoutMs = options.timeoutMs ?? 15_000;
  const backoffMs = options.backoffMs ?? 1_000;
  const fetchImpl = options.fetchImpl ?? fetch;

  let lastError: unknown;
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= retries; attempt += 1) {
    try {
      const response = await fetchImpl(url, {
        headers: {
          'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
          Accept: 'text/html,application/xhtml+xml',
        },
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        lastStatus = response.status;
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }

      return await response.text();
    } catch (err) {
      lastError = err;
      console.warn('results_fetch_failed', {
        url,
        attempt,
        attempts: retries,
        message: err instanceof Error ? err.message : String(err),
      });
      if (attempt < retries) {
        await delay(backoffMs * attempt);
      }
    }
  }

  const reason = lastError instanceof Error ? lastError.message : 'unknown error';
  throw new ProviderError(`failed to fetch ${url}: ${reason}`, 'http_error', { url, status: lastStatus });
}

export const createHtmlFetcher = (options: FetchHtmlOptions = {}): HtmlFetcher =>
  (url) => fetchHtml(url, options);
