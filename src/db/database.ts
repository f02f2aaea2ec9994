/**
 * IndexedDB database definition using Dexie.
 * All data persists in the browser; no server required.
 */
import Dexie, { type DexieOptions, type Table } from 'dexie';
import type { PurchaseReminderFrequency, BudgetReviewFrequency, ThemePreference } from '../domain/types';

// --- Table interfaces ---

export interface DbMonthlyBudget {
  id: string;
  year: number;
  month: number;        // 1–12
  category: string;
  amount: number;
}

export interface DbPurchase {
  id: string;
  date: string;         // YYYY-MM-DD
  monthKey: string;     // YYYY-MM (derived, indexed for fast month filtering)
  amount: number;
  category: string;
  note: string;
  createdAt: string;    // ISO timestamp
}

export interface DbSettings {
  id: number; // always 1
  currency: string;
  theme: ThemePreference;
  notifications_enabled: number; // 0 or 1
  purchase_reminder_frequency: PurchaseReminderFrequency;
  budget_review_frequency: BudgetReviewFrequency;
  is_first_launch: number; // 0 or 1
}

export const DEFAULT_DB_NAME = 'monthly-budget-db';

// --- Database class ---

export class BudgetDB extends Dexie {
  monthly_budgets!: Table<DbMonthlyBudget, string>;
  purchases!: Table<DbPurchase, string>;
  settings!: Table<DbSettings, number>;

  constructor(name: string = DEFAULT_DB_NAME, options?: DexieOptions) {
    super(name, options);

    // v1: initial schema
    this.version(1).stores({
      monthly_budgets: 'id, &[year+month+category], [year+month], year',
      purchases: 'id, date, monthKey, category',
      settings: 'id',
    });

    this.on('ready', () => {
      console.log(`[Dexie] Database ready (${this.name})`);
    });

    this.on('versionchange', () => {
      console.warn('[Dexie] Version change detected; another tab may have upgraded the DB');
    });
  }
}

export function createDatabase(name?: string, options?: DexieOptions): BudgetDB {
  return new BudgetDB(name, options);
}
