import Database from 'better-sqlite3';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULT_DB_PATH = path.join(__dirname, '../data/budget.db');

export type BudgetDatabase = Database.Database;

// Types
export interface BudgetRowRecord {
  category: string;
  amount: number;
}

export interface Purchase {
  id: string;
  date: string;
  amount: number;
  category: string;
  note: string;
  createdAt: string;
}

export interface PurchaseInput {
  date: string;
  amount: number;
  category: string;
  note: string;
}

export const THEMES = ['system', 'light', 'dark'] as const;
export const PURCHASE_REMINDER_FREQUENCIES = ['daily', 'weekly', 'monthly'] as const;
export const BUDGET_REVIEW_FREQUENCIES = ['monthly', 'yearly'] as const;

export type Theme = (typeof THEMES)[number];
export type PurchaseReminderFrequency = (typeof PURCHASE_REMINDER_FREQUENCIES)[number];
export type BudgetReviewFrequency = (typeof BUDGET_REVIEW_FREQUENCIES)[number];

export interface Settings {
  currency: string;
  theme: Theme;
  notificationsEnabled: boolean;
  purchaseReminderFrequency: PurchaseReminderFrequency;
  budgetReviewFrequency: BudgetReviewFrequency;
  isFirstLaunch: boolean;
}

interface SettingsRow {
  currency: string;
  theme: Theme;
  notifications_enabled: number;
  purchase_reminder_frequency: PurchaseReminderFrequency;
  budget_review_frequency: BudgetReviewFrequency;
  is_first_launch: number;
}

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

/**
 * Open (or create) the database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): BudgetDatabase {
  const db = new Database(dbPath);

  // Enable WAL mode for better performance
  db.pragma('journal_mode = WAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS monthly_budgets (
      id TEXT PRIMARY KEY,
      year INTEGER NOT NULL,
      month INTEGER NOT NULL CHECK (month BETWEEN 1 AND 12),
      category TEXT NOT NULL,
      amount REAL NOT NULL CHECK (amount >= 0),
      UNIQUE(year, month, category)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS purchases (
      id TEXT PRIMARY KEY,
      date TEXT NOT NULL,
      amount REAL NOT NULL CHECK (amount >= 0),
      category TEXT NOT NULL,
      note TEXT NOT NULL DEFAULT '',
      createdAt TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);

  // Create index on date for faster range queries
  db.exec(`CREATE INDEX IF NOT EXISTS idx_purchases_date ON purchases(date)`);

  // Settings table (single-row)
  db.exec(`
    CREATE TABLE IF NOT EXISTS settings (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      currency TEXT NOT NULL DEFAULT 'USD',
      theme TEXT NOT NULL DEFAULT 'system',
      notifications_enabled INTEGER NOT NULL DEFAULT 0,
      purchase_reminder_frequency TEXT NOT NULL DEFAULT 'daily',
      budget_review_frequency TEXT NOT NULL DEFAULT 'monthly',
      is_first_launch INTEGER NOT NULL DEFAULT 1
    )
  `);

  // Ensure the single row exists
  db.exec(`INSERT OR IGNORE INTO settings (id) VALUES (1)`);

  return db;
}

// --- Budgets ---

export function getMonthlyBudgets(db: BudgetDatabase, year: number, month: number): BudgetRowRecord[] {
  return db
    .prepare<[number, number], BudgetRowRecord>(
      'SELECT category, amount FROM monthly_budgets WHERE year = ? AND month = ? ORDER BY category',
    )
    .all(year, month);
}

/** Insert or overwrite one category's amount for one month */
export function upsertBudget(db: BudgetDatabase, year: number, month: number, category: string, amount: number): void {
  db.prepare<[string, number, number, string, number]>(`
    INSERT INTO monthly_budgets (id, year, month, category, amount)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(year, month, category) DO UPDATE SET amount = excluded.amount
  `).run(generateId(), year, month, category, amount);
}

/** Returns false when the category does not exist for that month */
export function updateBudgetAmount(
  db: BudgetDatabase,
  year: number,
  month: number,
  category: string,
  amount: number,
): boolean {
  const result = db
    .prepare<[number, number, number, string]>(
      'UPDATE monthly_budgets SET amount = ? WHERE year = ? AND month = ? AND category = ?',
    )
    .run(amount, year, month, category);
  return result.changes > 0;
}

export function deleteBudget(
  db: BudgetDatabase,
  category: string,
  fromMonth: number,
  year: number,
  includeFutureMonths: boolean,
): number {
  const lastMonth = includeFutureMonths ? 12 : fromMonth;
  const result = db
    .prepare<[number, string, number, number]>(
      'DELETE FROM monthly_budgets WHERE year = ? AND category = ? AND month BETWEEN ? AND ?',
    )
    .run(year, category, fromMonth, lastMonth);
  return result.changes;
}

/** Flush the WAL into the main database file */
export function checkpoint(db: BudgetDatabase): void {
  db.pragma('wal_checkpoint(TRUNCATE)');
}

// --- Purchases ---

export function getPurchases(db: BudgetDatabase, from?: string, to?: string): Purchase[] {
  if (from && to) {
    return db
      .prepare<[string, string], Purchase>(
        'SELECT * FROM purchases WHERE date BETWEEN ? AND ? ORDER BY date, createdAt',
      )
      .all(from, to);
  }
  return db.prepare<[], Purchase>('SELECT * FROM purchases ORDER BY date, createdAt').all();
}

export function getPurchase(db: BudgetDatabase, id: string): Purchase | undefined {
  return db.prepare<[string], Purchase>('SELECT * FROM purchases WHERE id = ?').get(id);
}

export function insertPurchases(db: BudgetDatabase, items: PurchaseInput[]): string[] {
  const insertStmt = db.prepare<[string, string, number, string, string]>(
    'INSERT INTO purchases (id, date, amount, category, note) VALUES (?, ?, ?, ?, ?)',
  );

  const insertMany = db.transaction((rows: PurchaseInput[]) => {
    const ids: string[] = [];
    for (const row of rows) {
      const id = generateId();
      insertStmt.run(id, row.date, row.amount, row.category, row.note);
      ids.push(id);
    }
    return ids;
  });

  return insertMany(items);
}

/** Returns false when no purchase has that id */
export function updatePurchase(db: BudgetDatabase, id: string, input: PurchaseInput): boolean {
  const result = db
    .prepare<[string, number, string, string, string]>(
      'UPDATE purchases SET date = ?, amount = ?, category = ?, note = ? WHERE id = ?',
    )
    .run(input.date, input.amount, input.category, input.note, id);
  return result.changes > 0;
}

export function deletePurchase(db: BudgetDatabase, id: string): boolean {
  return db.prepare<[string]>('DELETE FROM purchases WHERE id = ?').run(id).changes > 0;
}

// --- Settings ---

export function getSettings(db: BudgetDatabase): Settings {
  const row = db.prepare<[], SettingsRow>('SELECT * FROM settings WHERE id = 1').get();
  if (!row) {
    throw new Error('Settings row missing');
  }
  return {
    currency: row.currency,
    theme: row.theme,
    notificationsEnabled: row.notifications_enabled === 1,
    purchaseReminderFrequency: row.purchase_reminder_frequency,
    budgetReviewFrequency: row.budget_review_frequency,
    isFirstLaunch: row.is_first_launch === 1,
  };
}

export function updateSettings(db: BudgetDatabase, patch: Partial<Settings>): Settings {
  const next = { ...getSettings(db), ...patch };
  db.prepare<[string, string, number, string, string, number]>(`
    UPDATE settings SET
      currency = ?, theme = ?, notifications_enabled = ?,
      purchase_reminder_frequency = ?, budget_review_frequency = ?, is_first_launch = ?
    WHERE id = 1
  `).run(
    next.currency,
    next.theme,
    next.notificationsEnabled ? 1 : 0,
    next.purchaseReminderFrequency,
    next.budgetReviewFrequency,
    next.isFirstLaunch ? 1 : 0,
  );
  return next;
}
