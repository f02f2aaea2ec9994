import { describe, expect, it } from 'vitest';
import {
  bucketTotal,
  formatCurrency,
  isValidDateString,
  isValidMonth,
  monthKey,
  monthRange,
  totalSpent,
  utilization,
} from './computations';
import type { Purchase } from './types';

function makePurchase(overrides: Partial<Purchase> = {}): Purchase {
  return {
    id: 'p-1',
    date: '2024-06-10',
    amount: 25,
    category: 'Food',
    note: '',
    createdAt: '2024-06-10T09:00:00.000Z',
    ...overrides,
  };
}

describe('formatCurrency', () => {
  it('formats with two fraction digits', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(0)).toBe('$0.00');
    expect(formatCurrency(999999.99)).toBe('$999,999.99');
  });

  it('uses the requested currency', () => {
    expect(formatCurrency(1234.5, 'EUR')).toBe('€1,234.50');
  });
});

describe('month helpers', () => {
  it('accepts only whole months 1-12', () => {
    expect(isValidMonth(1)).toBe(true);
    expect(isValidMonth(12)).toBe(true);
    expect(isValidMonth(0)).toBe(false);
    expect(isValidMonth(13)).toBe(false);
    expect(isValidMonth(2.5)).toBe(false);
  });

  it('builds YYYY-MM keys', () => {
    expect(monthKey(2024, 3)).toBe('2024-03');
  });

  it('covers the whole month, leap years included', () => {
    expect(monthRange(2024, 2)).toEqual({ start: '2024-02-01', end: '2024-02-29' });
    expect(monthRange(2023, 2)).toEqual({ start: '2023-02-01', end: '2023-02-28' });
    expect(monthRange(2024, 12)).toEqual({ start: '2024-12-01', end: '2024-12-31' });
  });
});

describe('isValidDateString', () => {
  it('accepts real calendar days only', () => {
    expect(isValidDateString('2024-02-29')).toBe(true);
    expect(isValidDateString('2023-02-29')).toBe(false);
    expect(isValidDateString('2024-13-01')).toBe(false);
    expect(isValidDateString('2024-2-1')).toBe(false);
    expect(isValidDateString('06/10/2024')).toBe(false);
  });
});

describe('totals', () => {
  it('sums a month bucket', () => {
    expect(bucketTotal({ Rent: 900, Food: 250.5 })).toBe(1150.5);
    expect(bucketTotal(undefined)).toBe(0);
  });

  it('sums purchase amounts', () => {
    const purchases = [
      makePurchase({ amount: 20 }),
      makePurchase({ id: 'p-2', amount: 60, category: 'Fuel' }),
      makePurchase({ id: 'p-3', amount: 30 }),
    ];
    expect(totalSpent(purchases)).toBe(110);
    expect(totalSpent([])).toBe(0);
  });

  it('reports utilization only when something is budgeted', () => {
    expect(utilization({ budgeted: 200, spent: 50 })).toBe(0.25);
    expect(utilization({ budgeted: 0, spent: 50 })).toBeNull();
  });
});
