import { P } from './params.js';

export interface DateRange {
  start: Date;
  end: Date;
}

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

const MONTH_DAY = /^([A-Za-z]+)\s+(\d{1,2})$/;
const DAY_ONLY = /^\d{1,2}$/;

interface MonthDay {
  month: number;
  day: number;
}

const parseMonthDay = (token: string): MonthDay | null => {
  const match = MONTH_DAY.exec(token);
  if (!match) return null;
  const month = MONTHS.indexOf(match[1].toLowerCase());
  if (month < 0) return null;
  return { month, day: Number(match[2]) };
};

// Rejects days the month does not have instead of letting Date roll them over.
const utcDate = (year: number, { month, day }: MonthDay): Date | null => {
  const date = new Date(Date.UTC(year, month, day));
  return date.getUTCMonth() === month && date.getUTCDate() === day ? date : null;
};

/**
 * Resolves schedule text such as `February 27 - March 1` or `April 9 - 12` to
 * calendar days (UTC midnight) in `now`'s year. Returns null when the text
 * cannot be read; callers keep the tournament but leave its dates unset.
 */
export const resolveDateRange = (text: string, now: Date = new Date()): DateRange | null => {
  const tokens = text.split('-').map((token) => token.trim());
  if (tokens.length !== 2) return null;
  const [startToken, endToken] = tokens;
  if (!startToken || !endToken) return null;

  const startParts = parseMonthDay(startToken);
  if (!startParts) return null;

  let endParts: MonthDay | null = null;
  if (/\s/.test(endToken)) {
    endParts = parseMonthDay(endToken);
  } else if (DAY_ONLY.test(endToken)) {
    endParts = { month: startParts.month, day: Number(endToken) };
  }
  if (!endParts) return null;

  let year = now.getUTCFullYear();
  const wrapsYear = endParts.month < startParts.month ? 1 : 0;

  let start = utcDate(year, startParts);
  if (!start) return null;

  if (start.getTime() < now.getTime() && now.getUTCMonth() + 1 <= P.rolloverMonthMax) {
    year += 1;
    start = utcDate(year, startParts);
    if (!start) return null;
  }

  const end = utcDate(year + wrapsYear, endParts);
  if (!end || end.getTime() < start.getTime()) return null;

  return { start, end };
};

export const formatIsoDay = (date: Date) => date.toISOString().slice(0, 10);

export const addDays = (date: Date, days: number) => new Date(date.getTime() + days * 86_400_000);
