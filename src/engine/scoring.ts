import { P } from './params.js';
import { WeekBatchError } from './errors.js';
import type {
  Player,
  PlayerWeekScore,
  ResultRow,
  Team,
  TeamWeekResult,
  Tier,
  TournamentResults,
  WeeklyScoreEntry,
  WeekSummary,
} from './types.js';

export interface ApplyWeekInput {
  week: number;
  batch: TournamentResults[];
  teams: Team[];
  processedEventIds: ReadonlySet<string> | readonly string[];
}

/** Golf-style: lower is better. Placement, weighted by tier, halved for underdogs. */
export function scorePlacement(placement: number, tier: Pick<Tier, 'multiplier'>, isUnderdog: boolean) {
  if (!Number.isInteger(placement) || placement < 1) {
    throw new RangeError(`placement must be a positive integer, got ${placement}`);
  }
  const weighted = placement * tier.multiplier;
  return isUnderdog ? weighted * P.underdogFactor : weighted;
}

const indexResults = (results: ResultRow[]) => {
  const byId = new Map<number, ResultRow>();
  for (const row of results) {
    if (!byId.has(row.externalId)) byId.set(row.externalId, row);
  }
  return byId;
};

const assertBatch = (batch: TournamentResults[], processed: ReadonlySet<string>) => {
  if (!batch.length) {
    throw new WeekBatchError('weekly batch contains no tournaments', 'empty_batch');
  }

  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const item of batch) {
    if (seen.has(item.eventId)) repeated.add(item.eventId);
    seen.add(item.eventId);
  }
  if (repeated.size) {
    throw new WeekBatchError('weekly batch repeats an event', 'duplicate_event', { eventIds: [...repeated] });
  }

  for (const item of batch) {
    const invalid = item.results.find((row) => !Number.isInteger(row.placement) || row.placement < 1);
    if (invalid) {
      throw new WeekBatchError(
        `invalid placement ${invalid.placement} for ${invalid.name} in event ${item.eventId}`,
        'invalid_placement',
        { eventIds: [item.eventId] }
      );
    }
  }

  const already = [...seen].filter((id) => processed.has(id));
  if (already.length) {
    throw new WeekBatchError(
      `events already scored in an earlier week: ${already.join(', ')}`,
      'event_already_processed',
      { eventIds: already }
    );
  }
};

const scoreTeamWeek = (
  team: Team,
  week: number,
  batch: Array<{ item: TournamentResults; byId: Map<number, ResultRow> }>
): TeamWeekResult => {
  const played: PlayerWeekScore[] = [];

  for (const player of team.players) {
    const entries: WeeklyScoreEntry[] = [];
    let weekScore = 0;

    for (const { item, byId } of batch) {
      const result = byId.get(player.externalId);
      if (!result) continue;
      const score = scorePlacement(result.placement, item.tournament.tier, player.isUnderdog);
      weekScore += score;
      const entry: WeeklyScoreEntry = {
        week,
        tournament: item.tournament.name,
        placement: result.placement,
        score,
        tier: item.tournament.tier.label,
        counted: false,
      };
      player.weeklyScores.push(entry);
      entries.push(entry);
    }

    if (entries.length) {
      player.tournamentsPlayed += entries.length;
      played.push({ player, weekScore, tournamentsPlayed: entries.length, entries });
    }
  }

  // Array#sort is stable, so equal scores keep roster order.
  const selected = [...played].sort((a, b) => a.weekScore - b.weekScore).slice(0, P.topK);

  let teamWeekScore = 0;
  for (const pick of selected) {
    teamWeekScore += pick.weekScore;
    for (const entry of pick.entries) entry.counted = true;
    pick.player.seasonTotal += pick.weekScore;
    pick.player.timesCounted += 1;
  }

  return {
    teamName: team.name,
    teamWeekScore,
    playersWhoPlayed: played.length,
    selected,
  };
};

/**
 * Scores one week's batch of finished tournaments against every roster.
 * Mutates player accumulators and appends weekly entries; the batch itself is
 * validated first so a rejected batch leaves all state untouched.
 */
export function applyWeek(input: ApplyWeekInput): WeekSummary {
  assertBatch(input.batch, new Set<string>(input.processedEventIds));

  const indexed = input.batch.map((item) => ({ item, byId: indexResults(item.results) }));

  return {
    week: input.week,
    tournaments: input.batch.map((item) => item.tournament.name),
    eventIds: input.batch.map((item) => item.eventId),
    teams: input.teams.map((team) => scoreTeamWeek(team, input.week, indexed)),
  };
}

/** Rebuilds the season total from counted history, summed per week in the order the engine adds it. */
export function deriveSeasonTotal(player: Player) {
  const perWeek = new Map<number, number>();
  for (const entry of player.weeklyScores) {
    if (!entry.counted) continue;
    perWeek.set(entry.week, (perWeek.get(entry.week) ?? 0) + entry.score);
  }
  let total = 0;
  for (const weekScore of perWeek.values()) total += weekScore;
  return total;
}
