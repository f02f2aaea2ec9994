/**
 * CSV export for purchases and budgets.
 *
 * Commas inside text become semicolons and line breaks become spaces, so
 * every record stays on one line. A field holding a double quote is quoted,
 * with its quotes doubled.
 */
import { toDateString } from '../domain/computations';
import { dataParsingError } from '../domain/errors';
import { periodSlug, type TimePeriod } from '../domain/timePeriod';
import type { BudgetEntry, BudgetRow, MonthlyBudgets } from '../domain/types';

export const PURCHASE_CSV_HEADER = 'Date,Amount,Category,Note';
export const BUDGET_CSV_HEADER = 'Year,Month,Category,Amount,IsHistorical';

export function escapeCsvField(value: string): string {
  const flat = value.replace(/,/g, ';').replace(/\r?\n/g, ' ');
  return flat.includes('"') ? `"${flat.replace(/"/g, '""')}"` : flat;
}

export function formatPurchasesCsv(entries: BudgetEntry[]): string {
  if (entries.length === 0) {
    throw dataParsingError('No entries to export');
  }
  const rows = entries.map((e) =>
    [e.date, e.amount.toFixed(2), escapeCsvField(e.category), escapeCsvField(e.note)].join(','),
  );
  return [PURCHASE_CSV_HEADER, ...rows].join('\n');
}

export function formatBudgetsCsv(rows: BudgetRow[]): string {
  if (rows.length === 0) {
    throw dataParsingError('No entries to export');
  }
  const lines = rows.map((r) =>
    [r.year, r.month, escapeCsvField(r.category), r.amount.toFixed(2), r.isHistorical].join(','),
  );
  return [BUDGET_CSV_HEADER, ...lines].join('\n');
}

/** Flatten a year's month buckets into budget CSV rows, month order then name */
export function budgetRowsFor(year: number, budgets: MonthlyBudgets, isHistorical = false): BudgetRow[] {
  return Object.keys(budgets)
    .map(Number)
    .sort((a, b) => a - b)
    .flatMap((month) =>
      Object.entries(budgets[month])
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([category, amount]) => ({ year, month, category, amount, isHistorical })),
    );
}

/** e.g. budget_export_this_month_2024-06-15.csv */
export function exportFileName(period: TimePeriod, now: Date = new Date()): string {
  return `budget_export_${periodSlug(period)}_${toDateString(now)}.csv`;
}

/** e.g. budgets_2024_2024-06-15.csv */
export function budgetExportFileName(year: number, now: Date = new Date()): string {
  return `budgets_${year}_${toDateString(now)}.csv`;
}
