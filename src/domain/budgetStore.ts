/**
 * In-memory budget model for one year: month → (category → amount).
 *
 * All operations are synchronous; persistence happens in the caller.
 * Totals are derived on read so they can never drift from the map.
 */
import { bucketTotal, isValidMonth } from './computations';
import { validationError } from './errors';
import type { CategoryAmount, MonthBucket, MonthNumber, MonthlyBudgets } from './types';

/** Anything that can answer "what is budgeted for this month?" */
export interface MonthlyBudgetSource {
  getMonthlyBudgets(month: MonthNumber, year: number): Promise<CategoryAmount[]>;
}

export const MONTHS: readonly MonthNumber[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

function assertMonth(month: number): void {
  if (!isValidMonth(month)) {
    throw validationError(`Month must be between 1 and 12 (got ${month})`);
  }
}

/** Months affected by a propagating edit: `from` alone, or `from` through December */
export function monthsFrom(from: MonthNumber, propagate: boolean): MonthNumber[] {
  assertMonth(from);
  return propagate ? MONTHS.filter((m) => m >= from) : [from];
}

export class BudgetStore {
  private buckets = new Map<MonthNumber, Map<string, number>>();

  constructor(
    public year: number,
    initial: MonthlyBudgets = {},
  ) {
    this.replaceAll(initial);
  }

  // --- Mutations ---

  /**
   * Insert `name → amount` into `month`, and into every later month when
   * propagating. A name already present in a later month is overwritten.
   */
  addCategory(month: MonthNumber, name: string, amount: number, propagateToFutureMonths: boolean): void {
    for (const m of monthsFrom(month, propagateToFutureMonths)) {
      this.bucket(m).set(name, amount);
    }
  }

  updateCategory(month: MonthNumber, name: string, newAmount: number): void {
    assertMonth(month);
    if (!(newAmount >= 0)) {
      throw validationError('Amount must be non-negative');
    }
    const bucket = this.bucket(month);
    if (!bucket.has(name)) {
      throw validationError(`Category "${name}" does not exist in month ${month}`);
    }
    bucket.set(name, newAmount);
  }

  /** Rename and re-amount; an amount of zero removes the category instead */
  renameAndUpdate(
    month: MonthNumber,
    oldName: string,
    newName: string,
    newAmount: number,
    propagateToFutureMonths: boolean,
  ): void {
    if (!(newAmount >= 0)) {
      throw validationError('Amount must be non-negative');
    }
    for (const m of monthsFrom(month, propagateToFutureMonths)) {
      const bucket = this.bucket(m);
      bucket.delete(oldName);
      if (newAmount !== 0) {
        bucket.set(newName, newAmount);
      }
    }
  }

  /** Remove `name`; a missing name is a no-op */
  deleteCategory(name: string, fromMonth: MonthNumber, propagateToFutureMonths: boolean): void {
    for (const m of monthsFrom(fromMonth, propagateToFutureMonths)) {
      this.buckets.get(m)?.delete(name);
    }
  }

  /** Seed every month from another year's budgets, keeping this store's year */
  copyYear(source: MonthlyBudgets): void {
    this.replaceAll(source);
  }

  /**
   * Replace the whole map from `source`, months 1–12.
   * If any month fails to load the current state is left untouched.
   */
  async loadYear(year: number, source: MonthlyBudgetSource): Promise<void> {
    const rows = await Promise.all(MONTHS.map((m) => source.getMonthlyBudgets(m, year)));
    const next: MonthlyBudgets = {};
    MONTHS.forEach((m, i) => {
      next[m] = Object.fromEntries(rows[i].map((r) => [r.category, r.amount]));
    });
    this.year = year;
    this.replaceAll(next);
  }

  // --- Readers ---

  totalForMonth(month: MonthNumber): number {
    return bucketTotal(this.monthBucket(month));
  }

  totalForYear(): number {
    return MONTHS.reduce((sum, m) => sum + this.totalForMonth(m), 0);
  }

  categoryCount(month: MonthNumber): number {
    return this.buckets.get(month)?.size ?? 0;
  }

  availableCategories(): string[] {
    const names = new Set<string>();
    for (const bucket of this.buckets.values()) {
      for (const name of bucket.keys()) names.add(name);
    }
    return Array.from(names).sort();
  }

  hasAnyCategories(): boolean {
    return MONTHS.some((m) => this.categoryCount(m) > 0);
  }

  categoryNames(month: MonthNumber): string[] {
    return Array.from(this.buckets.get(month)?.keys() ?? []);
  }

  monthBucket(month: MonthNumber): MonthBucket {
    return Object.fromEntries(this.buckets.get(month) ?? []);
  }

  largestCategory(month: MonthNumber): CategoryAmount | null {
    return this.extreme(month, (a, b) => a > b);
  }

  smallestCategory(month: MonthNumber): CategoryAmount | null {
    return this.extreme(month, (a, b) => a < b);
  }

  /** Totals of the months that have at least one category, in month order */
  monthlyTotals(): number[] {
    return MONTHS.filter((m) => this.categoryCount(m) > 0).map((m) => this.totalForMonth(m));
  }

  /** Every (month, category, amount) triple, in month order */
  entries(): { month: MonthNumber; category: string; amount: number }[] {
    return MONTHS.flatMap((m) =>
      Array.from(this.buckets.get(m) ?? []).map(([category, amount]) => ({ month: m, category, amount })),
    );
  }

  /** Deep copy of the map, safe to hand to observers */
  snapshot(): MonthlyBudgets {
    const out: MonthlyBudgets = {};
    for (const m of MONTHS) {
      out[m] = this.monthBucket(m);
    }
    return out;
  }

  // --- Internals ---

  private bucket(month: MonthNumber): Map<string, number> {
    assertMonth(month);
    let bucket = this.buckets.get(month);
    if (!bucket) {
      bucket = new Map();
      this.buckets.set(month, bucket);
    }
    return bucket;
  }

  private replaceAll(source: MonthlyBudgets): void {
    const next = new Map<MonthNumber, Map<string, number>>();
    for (const m of MONTHS) {
      next.set(m, new Map(Object.entries(source[m] ?? {})));
    }
    this.buckets = next;
  }

  private extreme(month: MonthNumber, better: (a: number, b: number) => boolean): CategoryAmount | null {
    let best: CategoryAmount | null = null;
    for (const [category, amount] of this.buckets.get(month) ?? []) {
      if (!best || better(amount, best.amount)) {
        best = { category, amount };
      }
    }
    return best;
  }
}
