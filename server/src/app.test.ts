import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from './app.js';
import { getMonthlyBudgets, openDatabase, type BudgetDatabase } from './db.js';

describe('API routes', () => {
  let db: BudgetDatabase;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    db = openDatabase(':memory:');
    server = createApp(db).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    db.close();
  });

  function send(path: string, method: string, body?: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toEqual({ ok: true });
  });

  it('adds and reads back a category', async () => {
    const created = await send('/budgets', 'POST', { category: 'Rent', amount: 900, month: 6, year: 2024 });
    expect(created.status).toBe(201);

    const res = await fetch(`${baseUrl}/budgets?year=2024&month=6`);
    expect(await res.json()).toEqual([{ category: 'Rent', amount: 900 }]);
  });

  it('validates budget payloads', async () => {
    const res = await send('/budgets', 'POST', { category: 'Rent', amount: -5, month: 6, year: 2024 });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid budget payload' });
  });

  it('returns 404 when updating a missing category', async () => {
    const res = await send('/budgets', 'PUT', { category: 'Gym', amount: 40, month: 6, year: 2024 });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Category "Gym" not found' });
  });

  it('deletes through December when asked', async () => {
    for (const month of [5, 6, 7]) {
      await send('/budgets', 'POST', { category: 'Gym', amount: 40, month, year: 2024 });
    }
    const res = await send('/budgets?category=Gym&fromMonth=6&year=2024&includeFutureMonths=true', 'DELETE');

    expect(await res.json()).toEqual({ deleted: 2 });
    expect(getMonthlyBudgets(db, 2024, 5)).toEqual([{ category: 'Gym', amount: 40 }]);
  });

  it('imports purchases in bulk and rejects a bad row', async () => {
    const ok = await send('/purchases/bulk', 'POST', [
      { date: '2024-06-01', amount: 20, category: 'Food', note: '' },
      { date: '2024-06-02', amount: 5, category: 'Fuel' },
    ]);
    expect(await ok.json()).toEqual({ inserted: 2 });

    const bad = await send('/purchases/bulk', 'POST', [{ date: 'June 1', amount: 20, category: 'Food' }]);
    expect(bad.status).toBe(400);
    expect(await bad.json()).toEqual({ error: 'Invalid purchase at index 0' });
  });

  it('replaces a purchase and returns 404 for an unknown id', async () => {
    const created = await send('/purchases', 'POST', { date: '2024-06-01', amount: 20, category: 'Food', note: '' });
    const { id }: { id: string } = await created.json();

    const res = await send(`/purchases/${id}`, 'PUT', { date: '2024-06-03', amount: 18, category: 'Dining', note: 'Pho' });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ id, date: '2024-06-03', amount: 18, category: 'Dining', note: 'Pho' });

    const missing = await send('/purchases/nope', 'PUT', { date: '2024-06-03', amount: 18, category: 'Dining' });
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: 'Purchase not found' });
  });

  it('updates settings partially', async () => {
    const res = await send('/settings', 'PUT', { theme: 'dark' });
    expect(await res.json()).toMatchObject({ theme: 'dark', currency: 'USD' });

    const rejected = await send('/settings', 'PUT', { notificationsEnabled: 'yes' });
    expect(rejected.status).toBe(400);
  });

  it('rejects settings values outside their allowed set', async () => {
    for (const patch of [
      { theme: 'sepia' },
      { purchaseReminderFrequency: 'hourly' },
      { budgetReviewFrequency: 'weekly' },
      { currency: 'dollars' },
    ]) {
      const res = await send('/settings', 'PUT', patch);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid settings payload' });
    }

    const current = await fetch(`${baseUrl}/settings`);
    expect(await current.json()).toMatchObject({ theme: 'system', purchaseReminderFrequency: 'daily', currency: 'USD' });
  });
});
