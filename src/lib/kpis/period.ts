import type { Granularity } from '../data/contract';

const DAY_MS = 24 * 60 * 60 * 1000;

function toUtcDate(isoDate: string): Date {
  const [yearText, monthText, dayText] = isoDate.split('-');
  return new Date(
    Date.UTC(Number.parseInt(yearText, 10), Number.parseInt(monthText, 10) - 1, Number.parseInt(dayText, 10))
  );
}

/**
 * ISO-8601 week key, e.g. `2024-W01`. Weeks start on Monday and week 1 holds
 * the year's first Thursday, so early-January days can belong to the previous
 * week-year.
 */
export function isoWeekKey(isoDate: string): string {
  const date = toUtcDate(isoDate);
  const weekday = date.getUTCDay() || 7;
  date.setUTCDate(date.getUTCDate() + 4 - weekday);

  const weekYear = date.getUTCFullYear();
  const yearStart = Date.UTC(weekYear, 0, 1);
  const week = Math.ceil(((date.getTime() - yearStart) / DAY_MS + 1) / 7);

  return `${weekYear}-W${String(week).padStart(2, '0')}`;
}

export function periodKey(isoDate: string, granularity: Granularity): string {
  switch (granularity) {
    case 'daily':
      return isoDate;
    case 'weekly':
      return isoWeekKey(isoDate);
    case 'monthly':
      return isoDate.slice(0, 7);
  }
}

export function daysBetween(startIso: string, endIso: string): number {
  return Math.round((toUtcDate(endIso).getTime() - toUtcDate(startIso).getTime()) / DAY_MS);
}
