/**
 * Pure domain computations.
 * No React, no DB, no IO.
 */
import type { DateRange, MonthBucket, MonthNumber, Purchase, SpendingSummary } from './types';

const currencyFormatters = new Map<string, Intl.NumberFormat>();

/** Format an amount as localized currency text, e.g. 1234.5 → "$1,234.50" */
export function formatCurrency(amount: number, currency = 'USD', locale = 'en-US'): string {
  const key = `${locale}:${currency}`;
  let fmt = currencyFormatters.get(key);
  if (!fmt) {
    fmt = new Intl.NumberFormat(locale, {
      style: 'currency',
      currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    });
    currencyFormatters.set(key, fmt);
  }
  return fmt.format(amount);
}

/** Sum of a month bucket's amounts */
export function bucketTotal(bucket: MonthBucket | undefined): number {
  if (!bucket) return 0;
  return Object.values(bucket).reduce((sum, amount) => sum + amount, 0);
}

export function isValidMonth(month: number): month is MonthNumber {
  return Number.isInteger(month) && month >= 1 && month <= 12;
}

/** Filter purchases to an inclusive YYYY-MM-DD range */
export function inRange(purchases: Purchase[], range: DateRange): Purchase[] {
  return purchases.filter((p) => p.date >= range.start && p.date <= range.end);
}

/** Sum of purchase amounts */
export function totalSpent(purchases: Purchase[]): number {
  return purchases.reduce((sum, p) => sum + p.amount, 0);
}

/** spent ÷ budgeted; null when nothing is budgeted */
export function utilization(summary: SpendingSummary): number | null {
  if (summary.budgeted <= 0) return null;
  return summary.spent / summary.budgeted;
}

/** YYYY-MM label for a year and month */
export function monthKey(year: number, month: MonthNumber): string {
  return `${year}-${String(month).padStart(2, '0')}`;
}

/** Local calendar date as YYYY-MM-DD */
export function toDateString(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Inclusive date range covering one calendar month */
export function monthRange(year: number, month: MonthNumber): DateRange {
  const lastDay = new Date(year, month, 0).getDate();
  return {
    start: `${monthKey(year, month)}-01`,
    end: `${monthKey(year, month)}-${String(lastDay).padStart(2, '0')}`,
  };
}

/** Validate a YYYY-MM-DD string names a real calendar day */
export function isValidDateString(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Number(y), Number(m) - 1, Number(d));
  return (
    date.getFullYear() === Number(y) &&
    date.getMonth() === Number(m) - 1 &&
    date.getDate() === Number(d)
  );
}
