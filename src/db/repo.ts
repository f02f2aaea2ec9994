/**
 * Repository layer: IndexedDB implementation of the session's collaborators.
 *
 * Category edits are staged in memory and only reach IndexedDB when
 * `saveCurrentState()` commits them, in a single Dexie transaction.
 * Reads overlay the staged edits, so the session always sees its own writes.
 */
import { isValidMonth, monthKey } from '../domain/computations';
import { DEFAULT_SETTINGS, type CategoryAmount, type DateRange, type MonthNumber, type Purchase, type PurchaseInput, type Settings } from '../domain/types';
import type { BudgetPersistence, PurchaseStore, SettingsStore } from '../session/ports';
import type { BudgetDB, DbMonthlyBudget, DbPurchase, DbSettings } from './database';

type StagedChange =
  | { kind: 'put'; year: number; month: MonthNumber; category: string; amount: number }
  | { kind: 'delete'; year: number; month: MonthNumber; category: string };

// --- ID generation ---

export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

export function budgetRowId(year: number, month: MonthNumber, category: string): string {
  return `${year}:${month}:${category}`;
}

function toSettings(row: DbSettings): Settings {
  return {
    currency: row.currency,
    theme: row.theme,
    notificationsEnabled: row.notifications_enabled === 1,
    purchaseReminderFrequency: row.purchase_reminder_frequency,
    budgetReviewFrequency: row.budget_review_frequency,
    isFirstLaunch: row.is_first_launch === 1,
  };
}

function toDbSettings(s: Settings): DbSettings {
  return {
    id: 1,
    currency: s.currency,
    theme: s.theme,
    notifications_enabled: s.notificationsEnabled ? 1 : 0,
    purchase_reminder_frequency: s.purchaseReminderFrequency,
    budget_review_frequency: s.budgetReviewFrequency,
    is_first_launch: s.isFirstLaunch ? 1 : 0,
  };
}

function toPurchase(row: DbPurchase): Purchase {
  return {
    id: row.id,
    date: row.date,
    amount: row.amount,
    category: row.category,
    note: row.note,
    createdAt: row.createdAt,
  };
}

export class DexieBudgetRepository implements BudgetPersistence, PurchaseStore, SettingsStore {
  private staged: StagedChange[] = [];

  constructor(private readonly db: BudgetDB) {}

  /** Number of edits waiting for `saveCurrentState()` */
  get pendingChanges(): number {
    return this.staged.length;
  }

  // --- Budgets ---

  async getMonthlyBudgets(month: MonthNumber, year: number): Promise<CategoryAmount[]> {
    const rows = await this.db.monthly_budgets.where('[year+month]').equals([year, month]).toArray();
    const bucket = new Map(rows.map((r) => [r.category, r.amount]));

    for (const change of this.staged) {
      if (change.year !== year || change.month !== month) continue;
      if (change.kind === 'put') {
        bucket.set(change.category, change.amount);
      } else {
        bucket.delete(change.category);
      }
    }

    return Array.from(bucket, ([category, amount]) => ({ category, amount }));
  }

  async addCategory(name: string, amount: number, month: MonthNumber, year: number): Promise<void> {
    this.assertMonth(month);
    this.staged.push({ kind: 'put', year, month, category: name, amount });
  }

  async updateCategoryAmount(category: string, amount: number, month: MonthNumber, year: number): Promise<void> {
    this.assertMonth(month);
    const current = await this.getMonthlyBudgets(month, year);
    if (!current.some((c) => c.category === category)) {
      throw new Error(`Category "${category}" not found for ${monthKey(year, month)}`);
    }
    this.staged.push({ kind: 'put', year, month, category, amount });
  }

  async deleteMonthlyBudget(
    category: string,
    fromMonth: MonthNumber,
    year: number,
    includeFutureMonths: boolean,
  ): Promise<void> {
    this.assertMonth(fromMonth);
    const lastMonth = includeFutureMonths ? 12 : fromMonth;
    for (let month = fromMonth; month <= lastMonth; month++) {
      this.staged.push({ kind: 'delete', year, month, category });
    }
  }

  async saveCurrentState(): Promise<void> {
    if (this.staged.length === 0) return;
    const changes = this.staged;

    await this.db.transaction('rw', this.db.monthly_budgets, async () => {
      for (const change of changes) {
        const id = budgetRowId(change.year, change.month, change.category);
        if (change.kind === 'put') {
          const row: DbMonthlyBudget = {
            id,
            year: change.year,
            month: change.month,
            category: change.category,
            amount: change.amount,
          };
          await this.db.monthly_budgets.put(row);
        } else {
          await this.db.monthly_budgets.delete(id);
        }
      }
    });

    // Only drop what was committed; edits staged during the commit survive
    this.staged = this.staged.slice(changes.length);
    console.log(`[Dexie] Committed ${changes.length} budget change(s)`);
  }

  /** Drop staged edits without writing them */
  discardChanges(): void {
    this.staged = [];
  }

  // --- Purchases ---

  async getPurchases(range?: DateRange): Promise<Purchase[]> {
    const rows = range
      ? await this.db.purchases.where('date').between(range.start, range.end, true, true).toArray()
      : await this.db.purchases.orderBy('date').toArray();
    return rows.map(toPurchase);
  }

  async addPurchase(input: PurchaseInput): Promise<Purchase> {
    const row: DbPurchase = {
      id: generateId(),
      date: input.date,
      monthKey: input.date.slice(0, 7),
      amount: input.amount,
      category: input.category,
      note: input.note,
      createdAt: new Date().toISOString(),
    };
    await this.db.purchases.add(row);
    return toPurchase(row);
  }

  async updatePurchase(id: string, input: PurchaseInput): Promise<Purchase> {
    const existing = await this.db.purchases.get(id);
    if (!existing) {
      throw new Error(`Purchase ${id} not found`);
    }
    const row: DbPurchase = {
      ...existing,
      date: input.date,
      monthKey: input.date.slice(0, 7),
      amount: input.amount,
      category: input.category,
      note: input.note,
    };
    await this.db.purchases.put(row);
    return toPurchase(row);
  }

  async bulkAddPurchases(inputs: PurchaseInput[]): Promise<{ inserted: number }> {
    const createdAt = new Date().toISOString();
    const rows: DbPurchase[] = inputs.map((input) => ({
      id: generateId(),
      date: input.date,
      monthKey: input.date.slice(0, 7),
      amount: input.amount,
      category: input.category,
      note: input.note,
      createdAt,
    }));
    if (rows.length > 0) {
      await this.db.purchases.bulkAdd(rows);
    }
    return { inserted: rows.length };
  }

  async deletePurchase(id: string): Promise<void> {
    await this.db.purchases.delete(id);
  }

  // --- Settings ---

  async getSettings(): Promise<Settings> {
    const row = await this.db.settings.get(1);
    return row ? toSettings(row) : { ...DEFAULT_SETTINGS };
  }

  async updateSettings(patch: Partial<Settings>): Promise<Settings> {
    const next: Settings = { ...(await this.getSettings()), ...patch };
    await this.db.settings.put(toDbSettings(next));
    return next;
  }

  private assertMonth(month: number): void {
    if (!isValidMonth(month)) {
      throw new Error(`Invalid month: ${month}`);
    }
  }
}
