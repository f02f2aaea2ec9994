/**
 * Category input validation.
 *
 * Every rule runs on every call so the form can show all problems at once;
 * warnings never affect `isValid`.
 */
import { formatCurrency } from './computations';
import { DEFAULT_LIMITS, type CategoryValidation, type ValidationLimits } from './types';

export function validateCategory(
  name: string,
  amount: number,
  existingNames: Iterable<string>,
  limits: ValidationLimits = DEFAULT_LIMITS,
  currency = 'USD',
): CategoryValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const fieldErrors: CategoryValidation['fieldErrors'] = {};

  const fail = (field: 'name' | 'amount', message: string) => {
    errors.push(message);
    fieldErrors[field] ??= message;
  };

  const trimmed = name.trim();
  if (trimmed === '') {
    fail('name', 'Category name cannot be empty');
  }
  if (trimmed.length > limits.maxNameLength) {
    fail('name', `Category name must be ${limits.maxNameLength} characters or less`);
  }

  if (trimmed !== '') {
    const existing = Array.from(existingNames);
    if (existing.includes(trimmed)) {
      fail('name', 'Category already exists for this month');
    } else if (existing.some((n) => n.toLowerCase() === trimmed.toLowerCase())) {
      warnings.push('A similar category name already exists');
    }
  }

  if (!Number.isFinite(amount)) {
    fail('amount', 'Amount must be a valid number');
  } else {
    if (amount < limits.minAmount) {
      fail('amount', 'Amount must be non-negative');
    }
    if (amount > limits.maxAmount) {
      fail('amount', `Amount cannot exceed ${formatCurrency(limits.maxAmount, currency)}`);
    }
    if (amount === 0) {
      warnings.push('Amount is zero — category will not contribute to budget');
    }
    if (amount > limits.largeAmountThreshold) {
      warnings.push('Large amount — please verify this is correct');
    }
  }

  return { isValid: errors.length === 0, errors, warnings, fieldErrors };
}
