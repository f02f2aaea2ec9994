/**
 * Purchase log helpers: entry validation, filtering, sorting and statistics.
 * Pure functions; the session owns the list itself.
 */
import { isValidDateString } from './computations';
import { periodRange, type TimePeriod } from './timePeriod';
import { DEFAULT_LIMITS, type Purchase, type PurchaseInput, type ValidationLimits } from './types';

export const MAX_NOTE_LENGTH = 500;

export type PurchaseField = 'date' | 'amount' | 'category' | 'note';

export interface PurchaseValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  fieldErrors: Partial<Record<PurchaseField, string>>;
}

export interface PurchaseFilter {
  search: string;
  /** null means every category */
  category: string | null;
  period: TimePeriod;
}

export type PurchaseSortField = 'date' | 'amount' | 'category';

export interface PurchaseSort {
  field: PurchaseSortField;
  ascending: boolean;
}

export interface PurchaseStatistics {
  totalAmount: number;
  entryCount: number;
  averageAmount: number;
  categoryBreakdown: Record<string, number>;
  largestPurchase: Purchase | null;
  smallestPurchase: Purchase | null;
  /** Category with the highest spend */
  topCategory: string | null;
  dateRange: { start: string; end: string } | null;
}

export const DEFAULT_PURCHASE_FILTER: PurchaseFilter = {
  search: '',
  category: null,
  period: { kind: 'thisMonth' },
};

export const DEFAULT_PURCHASE_SORT: PurchaseSort = { field: 'date', ascending: false };

/**
 * Check a purchase before it is logged. `today` is YYYY-MM-DD; purchases
 * dated after it are rejected. Logging against a category with no budget
 * is allowed but warned about.
 */
export function validatePurchase(
  input: PurchaseInput,
  today: string,
  budgetedCategories: Iterable<string>,
  limits: ValidationLimits = DEFAULT_LIMITS,
): PurchaseValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const fieldErrors: PurchaseValidation['fieldErrors'] = {};

  const fail = (field: PurchaseField, message: string) => {
    errors.push(message);
    fieldErrors[field] ??= message;
  };

  if (!isValidDateString(input.date)) {
    fail('date', 'Invalid date');
  } else if (input.date > today) {
    fail('date', 'Date cannot be in the future');
  }

  if (!Number.isFinite(input.amount)) {
    fail('amount', 'Amount must be a valid number');
  } else if (input.amount <= 0) {
    fail('amount', 'Amount must be greater than zero');
  } else if (input.amount > limits.maxAmount) {
    fail('amount', 'Amount is too large');
  }

  const category = input.category.trim();
  if (category === '') {
    fail('category', 'Category cannot be empty');
  } else if (!Array.from(budgetedCategories).includes(category)) {
    warnings.push(`No budget is set for "${category}"`);
  }

  if (input.note.length > MAX_NOTE_LENGTH) {
    fail('note', 'Note exceeds maximum length');
  }

  return { isValid: errors.length === 0, errors, warnings, fieldErrors };
}

/** Trimmed copy of a purchase form's values */
export function normalizePurchase(input: PurchaseInput): PurchaseInput {
  return { date: input.date, amount: input.amount, category: input.category.trim(), note: input.note.trim() };
}

export function filterPurchases(purchases: Purchase[], filter: PurchaseFilter, now: Date = new Date()): Purchase[] {
  const range = periodRange(filter.period, now);
  const term = filter.search.trim().toLowerCase();

  return purchases.filter((p) => {
    if (p.date < range.start || p.date > range.end) return false;
    if (filter.category !== null && p.category !== filter.category) return false;
    if (term === '') return true;
    return (
      p.category.toLowerCase().includes(term) ||
      p.note.toLowerCase().includes(term) ||
      p.amount.toFixed(2).includes(term)
    );
  });
}

/** Sorted copy; ties fall back to creation time so the order is stable */
export function sortPurchases(purchases: Purchase[], sort: PurchaseSort): Purchase[] {
  const compare = (a: Purchase, b: Purchase): number => {
    switch (sort.field) {
      case 'date': return a.date.localeCompare(b.date);
      case 'amount': return a.amount - b.amount;
      case 'category': return a.category.localeCompare(b.category);
    }
  };
  const direction = sort.ascending ? 1 : -1;
  return [...purchases].sort(
    (a, b) => direction * (compare(a, b) || a.createdAt.localeCompare(b.createdAt)),
  );
}

export function purchaseStatistics(purchases: Purchase[]): PurchaseStatistics {
  const totalAmount = purchases.reduce((sum, p) => sum + p.amount, 0);
  const categoryBreakdown: Record<string, number> = {};
  let largestPurchase: Purchase | null = null;
  let smallestPurchase: Purchase | null = null;
  let start: string | null = null;
  let end: string | null = null;

  for (const p of purchases) {
    categoryBreakdown[p.category] = (categoryBreakdown[p.category] ?? 0) + p.amount;
    if (!largestPurchase || p.amount > largestPurchase.amount) largestPurchase = p;
    if (!smallestPurchase || p.amount < smallestPurchase.amount) smallestPurchase = p;
    if (start === null || p.date < start) start = p.date;
    if (end === null || p.date > end) end = p.date;
  }

  let topCategory: string | null = null;
  for (const [category, amount] of Object.entries(categoryBreakdown)) {
    if (topCategory === null || amount > categoryBreakdown[topCategory]) topCategory = category;
  }

  return {
    totalAmount,
    entryCount: purchases.length,
    averageAmount: purchases.length > 0 ? totalAmount / purchases.length : 0,
    categoryBreakdown,
    largestPurchase,
    smallestPurchase,
    topCategory,
    dateRange: start !== null && end !== null ? { start, end } : null,
  };
}

/** True when any filter differs from the default view (this month, everything) */
export function hasActiveFilters(filter: PurchaseFilter): boolean {
  return (
    filter.search.trim() !== '' ||
    filter.category !== null ||
    filter.period.kind !== DEFAULT_PURCHASE_FILTER.period.kind
  );
}
