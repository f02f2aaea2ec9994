import express, { type Express } from 'express';
import cors from 'cors';
import {
  checkpoint,
  deleteBudget,
  deletePurchase,
  getMonthlyBudgets,
  getPurchase,
  getPurchases,
  getSettings,
  insertPurchases,
  updateBudgetAmount,
  updatePurchase,
  updateSettings,
  upsertBudget,
  BUDGET_REVIEW_FREQUENCIES,
  PURCHASE_REMINDER_FREQUENCIES,
  THEMES,
  type BudgetDatabase,
  type PurchaseInput,
  type Settings,
} from './db.js';

interface BudgetBody {
  category: string;
  amount: number;
  month: number;
  year: number;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMonth(value: unknown): value is number {
  return Number.isInteger(value) && typeof value === 'number' && value >= 1 && value <= 12;
}

function readBudgetBody(body: unknown): BudgetBody | null {
  if (!isRecord(body)) return null;
  const { category, amount, month, year } = body;
  if (typeof category !== 'string' || category.trim() === '') return null;
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount < 0) return null;
  if (!isMonth(month)) return null;
  if (typeof year !== 'number' || !Number.isInteger(year)) return null;
  return { category, amount, month, year };
}

function readPurchaseInput(body: unknown): PurchaseInput | null {
  if (!isRecord(body)) return null;
  const { date, amount, category, note = '' } = body;
  if (typeof date !== 'string' || !DATE_PATTERN.test(date)) return null;
  if (typeof amount !== 'number' || !Number.isFinite(amount) || amount < 0) return null;
  if (typeof category !== 'string' || category.trim() === '') return null;
  if (typeof note !== 'string') return null;
  return { date, amount, category, note };
}

const CURRENCY_PATTERN = /^[A-Z]{3}$/;
const SETTINGS_BOOLEAN_KEYS = ['notificationsEnabled', 'isFirstLaunch'] as const;

function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return allowed.some((option) => option === value);
}

/** null when the body is malformed or a value is outside its allowed set */
function readSettingsPatch(body: unknown): Partial<Settings> | null {
  if (!isRecord(body)) return null;
  const patch: Partial<Settings> = {};
  const { currency, theme, purchaseReminderFrequency, budgetReviewFrequency } = body;

  if (currency !== undefined) {
    if (typeof currency !== 'string' || !CURRENCY_PATTERN.test(currency)) return null;
    patch.currency = currency;
  }
  if (theme !== undefined) {
    if (!isOneOf(THEMES, theme)) return null;
    patch.theme = theme;
  }
  if (purchaseReminderFrequency !== undefined) {
    if (!isOneOf(PURCHASE_REMINDER_FREQUENCIES, purchaseReminderFrequency)) return null;
    patch.purchaseReminderFrequency = purchaseReminderFrequency;
  }
  if (budgetReviewFrequency !== undefined) {
    if (!isOneOf(BUDGET_REVIEW_FREQUENCIES, budgetReviewFrequency)) return null;
    patch.budgetReviewFrequency = budgetReviewFrequency;
  }
  for (const key of SETTINGS_BOOLEAN_KEYS) {
    const value = body[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') return null;
    patch[key] = value;
  }
  return patch;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createApp(db: BudgetDatabase): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /budgets?year=2024&month=6 - One month's categories
  app.get('/budgets', (req, res) => {
    try {
      const year = Number(queryString(req.query.year));
      const month = Number(queryString(req.query.month));
      if (!Number.isInteger(year) || !isMonth(month)) {
        res.status(400).json({ error: 'year and month are required' });
        return;
      }
      res.json(getMonthlyBudgets(db, year, month));
    } catch (error) {
      console.error('[API] Error fetching budgets:', error);
      res.status(500).json({ error: 'Failed to fetch budgets' });
    }
  });

  // POST /budgets - Add or overwrite a category for one month
  app.post('/budgets', (req, res) => {
    try {
      const body = readBudgetBody(req.body);
      if (!body) {
        res.status(400).json({ error: 'Invalid budget payload' });
        return;
      }
      upsertBudget(db, body.year, body.month, body.category, body.amount);
      res.status(201).json({ ok: true });
    } catch (error) {
      console.error('[API] Error adding category:', error);
      res.status(500).json({ error: 'Failed to add category' });
    }
  });

  // PUT /budgets - Change the amount of an existing category
  app.put('/budgets', (req, res) => {
    try {
      const body = readBudgetBody(req.body);
      if (!body) {
        res.status(400).json({ error: 'Invalid budget payload' });
        return;
      }
      if (!updateBudgetAmount(db, body.year, body.month, body.category, body.amount)) {
        res.status(404).json({ error: `Category "${body.category}" not found` });
        return;
      }
      res.json({ ok: true });
    } catch (error) {
      console.error('[API] Error updating category:', error);
      res.status(500).json({ error: 'Failed to update category' });
    }
  });

  // DELETE /budgets?category=Food&fromMonth=3&year=2024&includeFutureMonths=true
  app.delete('/budgets', (req, res) => {
    try {
      const category = queryString(req.query.category);
      const fromMonth = Number(queryString(req.query.fromMonth));
      const year = Number(queryString(req.query.year));
      const includeFutureMonths = queryString(req.query.includeFutureMonths) === 'true';
      if (!category || !isMonth(fromMonth) || !Number.isInteger(year)) {
        res.status(400).json({ error: 'category, fromMonth and year are required' });
        return;
      }
      const deleted = deleteBudget(db, category, fromMonth, year, includeFutureMonths);
      res.json({ deleted });
    } catch (error) {
      console.error('[API] Error deleting category:', error);
      res.status(500).json({ error: 'Failed to delete category' });
    }
  });

  // POST /budgets/checkpoint - Flush pending writes to disk
  app.post('/budgets/checkpoint', (_req, res) => {
    try {
      checkpoint(db);
      res.json({ ok: true });
    } catch (error) {
      console.error('[API] Error saving budgets:', error);
      res.status(500).json({ error: 'Failed to save budgets' });
    }
  });

  // GET /purchases?from=2024-06-01&to=2024-06-30
  app.get('/purchases', (req, res) => {
    try {
      const from = queryString(req.query.from);
      const to = queryString(req.query.to);
      res.json(getPurchases(db, from, to));
    } catch (error) {
      console.error('[API] Error fetching purchases:', error);
      res.status(500).json({ error: 'Failed to fetch purchases' });
    }
  });

  // POST /purchases - Log a single purchase
  app.post('/purchases', (req, res) => {
    try {
      const input = readPurchaseInput(req.body);
      if (!input) {
        res.status(400).json({ error: 'Invalid purchase payload' });
        return;
      }
      const [id] = insertPurchases(db, [input]);
      res.status(201).json(getPurchase(db, id));
    } catch (error) {
      console.error('[API] Error creating purchase:', error);
      res.status(500).json({ error: 'Failed to add purchase' });
    }
  });

  // POST /purchases/bulk - Import many purchases in one transaction
  app.post('/purchases/bulk', (req, res) => {
    try {
      const body: unknown = req.body;
      if (!Array.isArray(body)) {
        res.status(400).json({ error: 'Expected an array of purchases' });
        return;
      }
      const inputs: PurchaseInput[] = [];
      for (const [index, item] of body.entries()) {
        const input = readPurchaseInput(item);
        if (!input) {
          res.status(400).json({ error: `Invalid purchase at index ${index}` });
          return;
        }
        inputs.push(input);
      }
      const ids = insertPurchases(db, inputs);
      console.log(`[API] Imported ${ids.length} purchase(s)`);
      res.status(201).json({ inserted: ids.length });
    } catch (error) {
      console.error('[API] Error importing purchases:', error);
      res.status(500).json({ error: 'Failed to import purchases' });
    }
  });

  // PUT /purchases/:id - Replace a purchase's fields
  app.put('/purchases/:id', (req, res) => {
    try {
      const input = readPurchaseInput(req.body);
      if (!input) {
        res.status(400).json({ error: 'Invalid purchase payload' });
        return;
      }
      if (!updatePurchase(db, req.params.id, input)) {
        res.status(404).json({ error: 'Purchase not found' });
        return;
      }
      res.json(getPurchase(db, req.params.id));
    } catch (error) {
      console.error('[API] Error updating purchase:', error);
      res.status(500).json({ error: 'Failed to update purchase' });
    }
  });

  // DELETE /purchases/:id
  app.delete('/purchases/:id', (req, res) => {
    try {
      if (!deletePurchase(db, req.params.id)) {
        res.status(404).json({ error: 'Purchase not found' });
        return;
      }
      res.json({ ok: true });
    } catch (error) {
      console.error('[API] Error deleting purchase:', error);
      res.status(500).json({ error: 'Failed to delete purchase' });
    }
  });

  // GET /settings
  app.get('/settings', (_req, res) => {
    try {
      res.json(getSettings(db));
    } catch (error) {
      console.error('[API] Error fetching settings:', error);
      res.status(500).json({ error: 'Failed to fetch settings' });
    }
  });

  // PUT /settings - Partial update
  app.put('/settings', (req, res) => {
    try {
      const patch = readSettingsPatch(req.body);
      if (!patch) {
        res.status(400).json({ error: 'Invalid settings payload' });
        return;
      }
      res.json(updateSettings(db, patch));
    } catch (error) {
      console.error('[API] Error updating settings:', error);
      res.status(500).json({ error: 'Failed to update settings' });
    }
  });

  return app;
}
