/**
 * HTTP implementation of the session's collaborators, backed by the API
 * server in server/src. Same contract as the IndexedDB repository.
 */
import type {
  CategoryAmount,
  DateRange,
  MonthNumber,
  Purchase,
  PurchaseInput,
  Settings,
} from '../domain/types';
import type { BudgetPersistence, PurchaseStore, SettingsStore } from '../session/ports';

const API_BASE = '/api';

async function readError(response: Response, fallback: string): Promise<string> {
  try {
    const body: { error?: unknown } = await response.json();
    return typeof body.error === 'string' ? body.error : fallback;
  } catch {
    return fallback;
  }
}

export class HttpBudgetClient implements BudgetPersistence, PurchaseStore, SettingsStore {
  constructor(private readonly baseUrl: string = API_BASE) {}

  private async send(path: string, init: RequestInit | undefined, failure: string): Promise<Response> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      ...init,
      headers: { 'Content-Type': 'application/json' },
    });
    if (!response.ok) {
      throw new Error(await readError(response, failure));
    }
    return response;
  }

  // --- Budgets ---

  async getMonthlyBudgets(month: MonthNumber, year: number): Promise<CategoryAmount[]> {
    const response = await this.send(`/budgets?year=${year}&month=${month}`, undefined, 'Failed to fetch budgets');
    return response.json();
  }

  async addCategory(name: string, amount: number, month: MonthNumber, year: number): Promise<void> {
    await this.send(
      '/budgets',
      { method: 'POST', body: JSON.stringify({ category: name, amount, month, year }) },
      'Failed to add category',
    );
  }

  async updateCategoryAmount(category: string, amount: number, month: MonthNumber, year: number): Promise<void> {
    await this.send(
      '/budgets',
      { method: 'PUT', body: JSON.stringify({ category, amount, month, year }) },
      'Failed to update category',
    );
  }

  async deleteMonthlyBudget(
    category: string,
    fromMonth: MonthNumber,
    year: number,
    includeFutureMonths: boolean,
  ): Promise<void> {
    const params = new URLSearchParams({
      category,
      fromMonth: String(fromMonth),
      year: String(year),
      includeFutureMonths: String(includeFutureMonths),
    });
    await this.send(`/budgets?${params.toString()}`, { method: 'DELETE' }, 'Failed to delete category');
  }

  async saveCurrentState(): Promise<void> {
    await this.send('/budgets/checkpoint', { method: 'POST' }, 'Failed to save budgets');
  }

  // --- Purchases ---

  async getPurchases(range?: DateRange): Promise<Purchase[]> {
    const query = range ? `?from=${range.start}&to=${range.end}` : '';
    const response = await this.send(`/purchases${query}`, undefined, 'Failed to fetch purchases');
    return response.json();
  }

  async addPurchase(input: PurchaseInput): Promise<Purchase> {
    const response = await this.send('/purchases', { method: 'POST', body: JSON.stringify(input) }, 'Failed to add purchase');
    return response.json();
  }

  async updatePurchase(id: string, input: PurchaseInput): Promise<Purchase> {
    const response = await this.send(
      `/purchases/${encodeURIComponent(id)}`,
      { method: 'PUT', body: JSON.stringify(input) },
      'Failed to update purchase',
    );
    return response.json();
  }

  async bulkAddPurchases(inputs: PurchaseInput[]): Promise<{ inserted: number }> {
    const response = await this.send(
      '/purchases/bulk',
      { method: 'POST', body: JSON.stringify(inputs) },
      'Failed to import purchases',
    );
    return response.json();
  }

  async deletePurchase(id: string): Promise<void> {
    await this.send(`/purchases/${encodeURIComponent(id)}`, { method: 'DELETE' }, 'Failed to delete purchase');
  }

  // --- Settings ---

  async getSettings(): Promise<Settings> {
    const response = await this.send('/settings', undefined, 'Failed to fetch settings');
    return response.json();
  }

  async updateSettings(patch: Partial<Settings>): Promise<Settings> {
    const response = await this.send('/settings', { method: 'PUT', body: JSON.stringify(patch) }, 'Failed to update settings');
    return response.json();
  }
}
