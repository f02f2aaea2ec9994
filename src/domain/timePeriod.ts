/**
 * Reporting periods used to filter purchases for export and analytics.
 * Every period resolves to an inclusive YYYY-MM-DD range relative to `now`.
 */
import { toDateString } from './computations';
import type { DateRange } from './types';

export type TimePeriod =
  | { kind: 'thisMonth' }
  | { kind: 'lastMonth' }
  | { kind: 'thisYear' }
  | { kind: 'lastYear' }
  | { kind: 'last30Days' }
  | { kind: 'last90Days' }
  | { kind: 'last12Months' }
  | { kind: 'allTime' }
  | { kind: 'custom'; start: string; end: string };

const EARLIEST_DATE = '0000-01-01';

export function periodLabel(period: TimePeriod): string {
  switch (period.kind) {
    case 'thisMonth': return 'This Month';
    case 'lastMonth': return 'Last Month';
    case 'thisYear': return 'This Year';
    case 'lastYear': return 'Last Year';
    case 'last30Days': return 'Last 30 Days';
    case 'last90Days': return 'Last 90 Days';
    case 'last12Months': return 'Last 12 Months';
    case 'allTime': return 'All Time';
    case 'custom': return `${period.start} – ${period.end}`;
  }
}

function daysBefore(now: Date, days: number): string {
  return toDateString(new Date(now.getFullYear(), now.getMonth(), now.getDate() - days));
}

export function periodRange(period: TimePeriod, now: Date = new Date()): DateRange {
  const y = now.getFullYear();
  const m = now.getMonth();
  const today = toDateString(now);

  switch (period.kind) {
    case 'thisMonth':
      return { start: toDateString(new Date(y, m, 1)), end: toDateString(new Date(y, m + 1, 0)) };
    case 'lastMonth':
      return { start: toDateString(new Date(y, m - 1, 1)), end: toDateString(new Date(y, m, 0)) };
    case 'thisYear':
      return { start: `${y}-01-01`, end: `${y}-12-31` };
    case 'lastYear':
      return { start: `${y - 1}-01-01`, end: `${y - 1}-12-31` };
    case 'last30Days':
      return { start: daysBefore(now, 30), end: today };
    case 'last90Days':
      return { start: daysBefore(now, 90), end: today };
    case 'last12Months':
      return { start: toDateString(new Date(y, m - 12, now.getDate())), end: today };
    case 'allTime':
      return { start: EARLIEST_DATE, end: today };
    case 'custom':
      return period.start <= period.end
        ? { start: period.start, end: period.end }
        : { start: period.end, end: period.start };
  }
}

/** File-name friendly slug, e.g. "last_30_days" */
export function periodSlug(period: TimePeriod): string {
  if (period.kind === 'custom') return `${period.start}_${period.end}`;
  return periodLabel(period).toLowerCase().replace(/ /g, '_');
}
