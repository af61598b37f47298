import * as cheerio from 'cheerio';

import type { ResultRow } from '../engine/types.js';
import { createHtmlFetcher, type HtmlFetcher } from './http.js';
import { ProviderError } from './types.js';
import type { EventQuery, EventRef, EventResults, ResultsProvider } from './types.js';

const EVENT_LINK = /\/tour\/event\/(\d+)/;
const EVENT_TOKEN = /event[/_](\d{5,})/;
const PLAYER_LINK = /\/player\/(\d+)/;
const DIGITS = /\d+/;

export interface PdgaProviderOptions {
  baseUrl?: string;
  fetchHtml?: HtmlFetcher;
}

export const eventUrl = (baseUrl: string, eventId: string) => `${baseUrl.replace(/\/+$/, '')}/tour/event/${eventId}`;

/** First event id linked from a tour search page, falling back to any event token in the markup. */
export function parseSearchPage(html: string): string | null {
  const $ = cheerio.load(html);
  for (const link of $('a[href]').toArray()) {
    const match = EVENT_LINK.exec($(link).attr('href') ?? '');
    if (match) return match[1];
  }
  return EVENT_TOKEN.exec(html)?.[1] ?? null;
}

/** Reads one division's final standings from an event page. */
export function parseEventPage(html: string, division: string, ref: EventRef): EventResults {
  const $ = cheerio.load(html);

  const title = $('title').first().text().split('|')[0]?.trim();
  const name = title || `Event ${ref.eventId}`;

  const header = $(`h3.division[id=${JSON.stringify(division)}]`).first();
  if (!header.length) {
    throw new ProviderError(`division ${division} not found on ${ref.url}`, 'division_not_found', {
      url: ref.url,
      division,
    });
  }

  let table = header.closest('details').find('table.results').first();
  if (!table.length) {
    const headerEl = header.get(0);
    const ordered = $('h3.division, table.results').toArray();
    const start = headerEl ? ordered.indexOf(headerEl) : -1;
    const next = ordered.slice(start + 1).find((el) => $(el).is('table.results'));
    if (next) table = $(next);
  }
  if (!table.length) {
    throw new ProviderError(`results table for ${division} not found on ${ref.url}`, 'results_table_not_found', {
      url: ref.url,
      division,
    });
  }

  const body = table.find('tbody');
  const rows = body.length ? body.find('tr') : table.find('tr').slice(1);

  const results: ResultRow[] = [];
  rows.each((_, el) => {
    const row = $(el);
    const placeText = row.find('td.place').first().text().trim();
    const placeMatch = DIGITS.exec(placeText);
    if (!placeMatch) return;

    const link = row.find('td.player a').first();
    const name = link.text().trim();
    if (!link.length || !name) return;

    const idMatch =
      PLAYER_LINK.exec(link.attr('href') ?? '')?.[1] ?? DIGITS.exec(row.find('td.pdga-number').first().text())?.[0];
    if (!idMatch) return;

    results.push({
      placement: Number(placeMatch[0]),
      externalId: Number(idMatch),
      name,
      tied: placeText.toUpperCase().includes('T'),
    });
  });

  return { eventId: ref.eventId, name, division, url: ref.url, results };
}

export class PdgaResultsProvider implements ResultsProvider {
  private readonly baseUrl: string;
  private readonly fetchHtml: HtmlFetcher;

  constructor(options: PdgaProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://www.pdga.com').replace(/\/+$/, '');
    this.fetchHtml = options.fetchHtml ?? createHtmlFetcher();
  }

  async findEvent(query: EventQuery): Promise<EventRef | null> {
    if (query.eventId) {
      return { eventId: query.eventId, url: eventUrl(this.baseUrl, query.eventId) };
    }

    const name = query.name.trim();
    if (!name) return null;
    if (/^\d+$/.test(name)) {
      return { eventId: name, url: eventUrl(this.baseUrl, name) };
    }

    const params = new URLSearchParams({ title: name, OfficialName: name });
    const html = await this.fetchHtml(`${this.baseUrl}/tour/search?${params.toString()}`);
    const eventId = parseSearchPage(html);
    return eventId ? { eventId, url: eventUrl(this.baseUrl, eventId) } : null;
  }

  async fetchResults(ref: EventRef, division: string): Promise<EventResults> {
    const html = await this.fetchHtml(ref.url);
    return parseEventPage(html, division, ref);
  }
}
