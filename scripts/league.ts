#!/usr/bin/env tsx
import 'dotenv/config';
import { writeFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { closePool } from '../src/db/client.js';
import { loadConfig } from '../src/config.js';
import type { AppConfig } from '../src/config.js';
import { formatIsoDay } from '../src/engine/dates.js';
import { loadScheduleFile } from '../src/league/schedule-file.js';
import { runWeeklyUpdate } from '../src/league/update.js';
import type { UpdateReport } from '../src/league/update.js';
import { createHtmlFetcher } from '../src/providers/http.js';
import { PdgaResultsProvider } from '../src/providers/pdga.js';
import type { EventResults } from '../src/providers/types.js';
import { ProviderError } from '../src/providers/types.js';
import { getStore } from '../src/store/index.js';

const formatScore = (value: number) => value.toLocaleString('en-US', { maximumFractionDigits: 2 });

const createProvider = (config: AppConfig) =>
  new PdgaResultsProvider({
    baseUrl: config.results.baseUrl,
    fetchHtml: createHtmlFetcher({ timeoutMs: config.results.timeoutMs, retries: config.results.retries }),
  });

const printReport = (report: UpdateReport) => {
  for (const item of report.skipped) {
    console.log(`- skipped ${item.tournament} (${item.reason}${item.message ? `: ${item.message}` : ''})`);
  }

  if (report.week === null) {
    console.log(`No new finished tournaments between ${report.window.from} and ${report.window.to}.`);
    return;
  }

  console.log(
    `${report.dryRun ? 'Dry-run for' : 'Applied'} week ${report.week}: ${report.scored.map((item) => item.tournament).join(', ')}`
  );
  for (const team of report.teams) {
    const picks = team.players.map((pick) => `${pick.name} ${formatScore(pick.score)}`).join(', ');
    console.log(`  ${team.teamName}: ${formatScore(team.teamWeekScore)}${picks ? ` (${picks})` : ''}`);
  }

  console.log('Standings:');
  for (const entry of report.standings) {
    console.log(`  ${entry.rank}. ${entry.teamName} (${entry.owner}) ${formatScore(entry.totalScore)}`);
  }
};

const printResults = (results: EventResults, limit: number) => {
  console.log(`${results.name} [${results.division}] ${results.url}`);
  for (const row of results.results.slice(0, limit)) {
    console.log(`  ${row.tied ? 'T' : ''}${row.placement}. ${row.name} #${row.externalId}`);
  }
  if (results.results.length > limit) {
    console.log(`  ... ${results.results.length - limit} more`);
  }
};

const runUpdate = async (argv: { daysBack?: number; dryRun: boolean }) => {
  const config = loadConfig();
  const { index: schedule } = await loadScheduleFile(config.scheduleFile);
  const report = await runWeeklyUpdate(
    {
      store: getStore({ databaseUrl: config.databaseUrl, dataDir: config.dataDir }),
      provider: createProvider(config),
      schedule,
    },
    {
      daysBack: argv.daysBack ?? config.update.daysBack,
      requestDelayMs: config.update.requestDelayMs,
      division: config.results.division,
      dryRun: argv.dryRun,
    }
  );
  printReport(report);
};

const runEvent = async (argv: { eventId: string; division?: string; output?: string; limit: number }) => {
  const config = loadConfig();
  const provider = createProvider(config);
  const ref = await provider.findEvent({ name: argv.eventId, eventId: argv.eventId });
  if (!ref) {
    console.error('event_not_found', { eventId: argv.eventId });
    process.exitCode = 1;
    return;
  }

  const results = await provider.fetchResults(ref, argv.division ?? config.results.division);
  printResults(results, argv.limit);

  if (argv.output) {
    await writeFile(argv.output, `${JSON.stringify(results, null, 2)}\n`, 'utf8');
    console.log(`Wrote ${results.results.length} result(s) to ${argv.output}`);
  }
};

const runEvents = async (argv: { division?: string; limit: number }) => {
  const config = loadConfig();
  const provider = createProvider(config);
  const { index: schedule } = await loadScheduleFile(config.scheduleFile);
  const tournaments = schedule.withEventIds();
  if (!tournaments.length) {
    console.log('No scheduled tournaments carry an event id.');
    return;
  }

  const failures: Array<{ tournament: string; message: string }> = [];

  for (const [index, tournament] of tournaments.entries()) {
    if (index > 0) await delay(config.update.requestDelayMs);
    console.log(`Fetching ${tournament.name} (${index + 1}/${tournaments.length})`);
    try {
      const ref = await provider.findEvent({ name: tournament.name, eventId: tournament.eventId });
      if (!ref) continue;
      printResults(await provider.fetchResults(ref, argv.division ?? config.results.division), argv.limit);
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      console.error('event_fetch_failed', { tournament: tournament.name, code: err.code });
      failures.push({ tournament: tournament.name, message: err.message });
    }
  }

  if (failures.length) {
    console.warn('Fetch failures:', failures.map((failure) => `${failure.tournament} (${failure.message})`).join(', '));
  }
};

const runSchedule = async (argv: { json: boolean; upcoming?: number }) => {
  const config = loadConfig();
  const now = new Date();
  const { index: schedule, issues } = await loadScheduleFile(config.scheduleFile, {
    now,
    logger: { info: () => undefined, warn: console.warn, error: console.error },
  });
  const tournaments = argv.upcoming === undefined ? schedule.sortedByStart() : schedule.upcoming(argv.upcoming, now);

  if (argv.json) {
    console.log(JSON.stringify({ tournaments, issues }, null, 2));
    return;
  }

  if (argv.upcoming !== undefined) {
    console.log(`Starting within ${argv.upcoming} day(s):`);
  }
  for (const tournament of tournaments) {
    const start = tournament.startDate ? formatIsoDay(tournament.startDate) : '????-??-??';
    const end = tournament.endDate ? formatIsoDay(tournament.endDate) : '????-??-??';
    console.log(
      `${start} .. ${end}  ${tournament.tierAbbreviation.padEnd(3)} x${tournament.tier.multiplier}  ${tournament.name}${tournament.eventId ? ` #${tournament.eventId}` : ''}`
    );
  }
  console.log(`${schedule.size} tournament(s), ${schedule.withEventIds().length} with event ids, ${issues.length} issue(s).`);
};

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('league')
    .command(
      'update',
      'Score finished tournaments from the look-back window as the next week',
      (cmd) =>
        cmd
          .option('days-back', {
            type: 'number',
            describe: 'Look-back window in days',
          })
          .option('dry-run', {
            type: 'boolean',
            default: false,
            describe: 'Compute the week without writing any document',
          }),
      (argv) => runUpdate(argv)
    )
    .command(
      'event <eventId>',
      'Fetch and print the results of one event',
      (cmd) =>
        cmd
          .positional('eventId', {
            type: 'string',
            describe: 'Results site event id',
            demandOption: true,
          })
          .option('division', {
            type: 'string',
            describe: 'Division code, e.g. MPO',
          })
          .option('output', {
            type: 'string',
            describe: 'Write the parsed results as JSON to this file',
          })
          .option('limit', {
            type: 'number',
            default: 20,
            describe: 'Rows to print',
          }),
      (argv) => runEvent(argv)
    )
    .command(
      'events',
      'Fetch results for every scheduled tournament with an event id',
      (cmd) =>
        cmd
          .option('division', {
            type: 'string',
            describe: 'Division code, e.g. MPO',
          })
          .option('limit', {
            type: 'number',
            default: 10,
            describe: 'Rows to print per event',
          }),
      (argv) => runEvents(argv)
    )
    .command(
      'schedule',
      'Print the parsed season schedule',
      (cmd) =>
        cmd
          .option('json', {
            type: 'boolean',
            default: false,
            describe: 'Print JSON instead of a table',
          })
          .option('upcoming', {
            type: 'number',
            describe: 'Only tournaments starting within this many days',
          }),
      (argv) => runSchedule(argv)
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(async () => {
    if (!process.env.DATABASE_URL) return;
    try {
      await closePool();
    } catch (err) {
      console.error('Failed to close database connection', err);
    }
  });
