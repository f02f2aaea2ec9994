/**
 * Collaborators the session talks to. Both the IndexedDB repository and the
 * HTTP client implement these, so screens never know which one is in use.
 */
import type { MonthlyBudgetSource } from '../domain/budgetStore';
import type { DateRange, MonthNumber, Purchase, PurchaseInput, Settings } from '../domain/types';

/** Every method resolves on success and rejects on failure */
export interface BudgetPersistence extends MonthlyBudgetSource {
  addCategory(name: string, amount: number, month: MonthNumber, year: number): Promise<void>;
  updateCategoryAmount(category: string, amount: number, month: MonthNumber, year: number): Promise<void>;
  deleteMonthlyBudget(
    category: string,
    fromMonth: MonthNumber,
    year: number,
    includeFutureMonths: boolean,
  ): Promise<void>;
  saveCurrentState(): Promise<void>;
}

export interface PurchaseStore {
  getPurchases(range?: DateRange): Promise<Purchase[]>;
  addPurchase(input: PurchaseInput): Promise<Purchase>;
  updatePurchase(id: string, input: PurchaseInput): Promise<Purchase>;
  bulkAddPurchases(inputs: PurchaseInput[]): Promise<{ inserted: number }>;
  deletePurchase(id: string): Promise<void>;
}

export interface SettingsStore {
  getSettings(): Promise<Settings>;
  updateSettings(patch: Partial<Settings>): Promise<Settings>;
}

/** Fire-and-forget sink for session-level failures */
export interface ErrorReporter {
  handle(error: Error, context: string): void;
}

/** Default reporter: log to the console with the operation label */
export const consoleErrorReporter: ErrorReporter = {
  handle(error, context) {
    console.error(`[BudgetSession] ${context} failed:`, error);
  },
};
