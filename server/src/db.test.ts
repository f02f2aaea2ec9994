import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  checkpoint,
  deleteBudget,
  deletePurchase,
  getMonthlyBudgets,
  getPurchases,
  getSettings,
  insertPurchases,
  openDatabase,
  updateBudgetAmount,
  updatePurchase,
  updateSettings,
  upsertBudget,
  type BudgetDatabase,
} from './db.js';

describe('server database', () => {
  let db: BudgetDatabase;

  beforeEach(() => {
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  describe('budgets', () => {
    it('returns one month ordered by category', () => {
      upsertBudget(db, 2024, 6, 'Rent', 900);
      upsertBudget(db, 2024, 6, 'Food', 300);
      upsertBudget(db, 2024, 7, 'Rent', 950);

      expect(getMonthlyBudgets(db, 2024, 6)).toEqual([
        { category: 'Food', amount: 300 },
        { category: 'Rent', amount: 900 },
      ]);
    });

    it('overwrites on a repeated add', () => {
      upsertBudget(db, 2024, 6, 'Rent', 900);
      upsertBudget(db, 2024, 6, 'Rent', 1000);
      expect(getMonthlyBudgets(db, 2024, 6)).toEqual([{ category: 'Rent', amount: 1000 }]);
    });

    it('updates only rows that exist', () => {
      upsertBudget(db, 2024, 6, 'Rent', 900);
      expect(updateBudgetAmount(db, 2024, 6, 'Rent', 925)).toBe(true);
      expect(updateBudgetAmount(db, 2024, 6, 'Gym', 40)).toBe(false);
      expect(getMonthlyBudgets(db, 2024, 6)).toEqual([{ category: 'Rent', amount: 925 }]);
    });

    it('deletes one month or through December', () => {
      for (let month = 1; month <= 12; month++) upsertBudget(db, 2024, month, 'Gym', 40);

      expect(deleteBudget(db, 'Gym', 4, 2024, false)).toBe(1);
      expect(deleteBudget(db, 'Gym', 10, 2024, true)).toBe(3);
      expect(getMonthlyBudgets(db, 2024, 9)).toEqual([{ category: 'Gym', amount: 40 }]);
      expect(getMonthlyBudgets(db, 2024, 11)).toEqual([]);
    });

    it('rejects negative amounts at the schema level', () => {
      expect(() => upsertBudget(db, 2024, 6, 'Rent', -1)).toThrow();
    });

    it('checkpoints without error', () => {
      upsertBudget(db, 2024, 6, 'Rent', 900);
      expect(() => checkpoint(db)).not.toThrow();
    });
  });

  describe('purchases', () => {
    it('inserts in bulk and filters by inclusive range', () => {
      const ids = insertPurchases(db, [
        { date: '2024-05-31', amount: 10, category: 'Food', note: '' },
        { date: '2024-06-01', amount: 20, category: 'Food', note: 'Market' },
        { date: '2024-06-30', amount: 30, category: 'Fuel', note: '' },
      ]);

      expect(ids).toHaveLength(3);
      expect(getPurchases(db, '2024-06-01', '2024-06-30').map((p) => p.amount)).toEqual([20, 30]);
      expect(getPurchases(db)).toHaveLength(3);
    });

    it('updates every field of an existing purchase', () => {
      const [id] = insertPurchases(db, [{ date: '2024-06-01', amount: 20, category: 'Food', note: '' }]);

      expect(updatePurchase(db, id, { date: '2024-06-02', amount: 22.5, category: 'Dining', note: 'Lunch' })).toBe(true);
      expect(updatePurchase(db, 'missing', { date: '2024-06-02', amount: 1, category: 'Food', note: '' })).toBe(false);
      expect(getPurchases(db)).toMatchObject([{ id, date: '2024-06-02', amount: 22.5, category: 'Dining', note: 'Lunch' }]);
    });

    it('deletes by id', () => {
      const [id] = insertPurchases(db, [{ date: '2024-06-01', amount: 20, category: 'Food', note: '' }]);
      expect(deletePurchase(db, id)).toBe(true);
      expect(deletePurchase(db, id)).toBe(false);
      expect(getPurchases(db)).toEqual([]);
    });
  });

  describe('settings', () => {
    it('starts from defaults', () => {
      expect(getSettings(db)).toEqual({
        currency: 'USD',
        theme: 'system',
        notificationsEnabled: false,
        purchaseReminderFrequency: 'daily',
        budgetReviewFrequency: 'monthly',
        isFirstLaunch: true,
      });
    });

    it('applies partial updates', () => {
      updateSettings(db, { currency: 'EUR', isFirstLaunch: false });
      expect(getSettings(db)).toMatchObject({ currency: 'EUR', theme: 'system', isFirstLaunch: false });
    });
  });
});
