import { describe, expect, it } from 'vitest';
import { validateCategory } from './validation';
import { DEFAULT_LIMITS } from './types';

describe('validateCategory', () => {
  it('accepts a new name with an ordinary amount', () => {
    const result = validateCategory('Groceries', 400, ['Rent']);
    expect(result).toEqual({ isValid: true, errors: [], warnings: [], fieldErrors: {} });
  });

  it('rejects an empty or whitespace-only name', () => {
    for (const name of ['', '   ']) {
      const result = validateCategory(name, 100, []);
      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(['Category name cannot be empty']);
      expect(result.fieldErrors.name).toBe('Category name cannot be empty');
    }
  });

  it('enforces the maximum name length after trimming', () => {
    expect(validateCategory('a'.repeat(50), 10, []).isValid).toBe(true);
    expect(validateCategory(`  ${'a'.repeat(50)}  `, 10, []).isValid).toBe(true);

    const result = validateCategory('a'.repeat(51), 10, []);
    expect(result.errors).toEqual(['Category name must be 50 characters or less']);
  });

  it('rejects a name already used this month, comparing trimmed names', () => {
    const result = validateCategory(' Rent ', 900, ['Rent', 'Food']);
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['Category already exists for this month']);
  });

  it('only warns when a name differs from an existing one by case', () => {
    const result = validateCategory('rent', 900, ['Rent']);
    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(['A similar category name already exists']);
  });

  it('rejects negative amounts', () => {
    const result = validateCategory('Food', -0.01, []);
    expect(result.errors).toEqual(['Amount must be non-negative']);
    expect(result.fieldErrors).toEqual({ amount: 'Amount must be non-negative' });
  });

  it('rejects amounts above the maximum and warns that they are large', () => {
    const result = validateCategory('Food', 1_000_000, []);
    expect(result.errors).toEqual(['Amount cannot exceed $999,999.99']);
    expect(result.warnings).toEqual(['Large amount — please verify this is correct']);
  });

  it('formats the maximum in the configured currency', () => {
    const result = validateCategory('Food', 1_000_000, [], DEFAULT_LIMITS, 'EUR');
    expect(result.errors).toEqual(['Amount cannot exceed €999,999.99']);
  });

  it('warns about a zero amount without failing', () => {
    const result = validateCategory('Gifts', 0, []);
    expect(result.isValid).toBe(true);
    expect(result.warnings).toEqual(['Amount is zero — category will not contribute to budget']);
  });

  it('warns only above the large amount threshold', () => {
    expect(validateCategory('Car', 10000, []).warnings).toEqual([]);
    expect(validateCategory('Car', 10000.01, []).warnings).toEqual([
      'Large amount — please verify this is correct',
    ]);
  });

  it('rejects amounts that are not numbers', () => {
    const result = validateCategory('Food', Number.NaN, []);
    expect(result.errors).toEqual(['Amount must be a valid number']);
    expect(result.warnings).toEqual([]);
  });

  it('reports every failing rule at once', () => {
    const result = validateCategory('', -5, []);
    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual(['Category name cannot be empty', 'Amount must be non-negative']);
    expect(result.fieldErrors).toEqual({
      name: 'Category name cannot be empty',
      amount: 'Amount must be non-negative',
    });
  });

  it('honours custom limits', () => {
    const limits = { ...DEFAULT_LIMITS, maxNameLength: 5, maxAmount: 100, largeAmountThreshold: 50 };
    const result = validateCategory('Holiday', 75, [], limits);
    expect(result.errors).toEqual(['Category name must be 5 characters or less']);
    expect(result.warnings).toEqual(['Large amount — please verify this is correct']);
  });
});
