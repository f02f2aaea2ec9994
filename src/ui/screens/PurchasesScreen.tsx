import { useEffect } from 'react';
import type { BudgetSession, SessionState } from '../../session/budgetSession';
import { formatCurrency } from '../../domain/computations';
import { periodLabel, type TimePeriod } from '../../domain/timePeriod';
import type { PurchaseSortField } from '../../domain/purchases';
import { PurchaseForm } from '../components/PurchaseForm';
import { PurchaseList } from '../components/PurchaseList';

const FILTER_PERIODS: TimePeriod[] = [
  { kind: 'thisMonth' },
  { kind: 'lastMonth' },
  { kind: 'last30Days' },
  { kind: 'last90Days' },
  { kind: 'thisYear' },
  { kind: 'allTime' },
];

const SORT_FIELDS: { field: PurchaseSortField; label: string }[] = [
  { field: 'date', label: 'Date' },
  { field: 'amount', label: 'Amount' },
  { field: 'category', label: 'Category' },
];

export interface PurchasesScreenProps {
  session: BudgetSession;
  state: SessionState;
  currency: string;
}

export function PurchasesScreen({ session, state, currency }: PurchasesScreenProps) {
  const { purchases, purchaseFilter, purchaseSort, purchaseStatistics: stats, viewState } = state;

  useEffect(() => {
    void session.loadPurchases();
  }, [session]);

  const periodIndex = FILTER_PERIODS.findIndex((p) => p.kind === purchaseFilter.period.kind);

  return (
    <div className="screen-content purchases-screen">
      <PurchaseForm session={session} state={state} />

      {viewState.status === 'error' && (
        <div className="error-banner">
          <p>{viewState.error.message}</p>
          <button className="btn btn-primary" onClick={() => void session.loadPurchases()}>Retry</button>
        </div>
      )}

      <div className="purchase-filters">
        <input
          type="search"
          placeholder="Search"
          value={purchaseFilter.search}
          onChange={(e) => session.setPurchaseFilter({ search: e.target.value })}
        />
        <select
          value={purchaseFilter.category ?? ''}
          onChange={(e) => session.setPurchaseFilter({ category: e.target.value === '' ? null : e.target.value })}
        >
          <option value="">All</option>
          {state.availableCategories.map((cat) => <option key={cat} value={cat}>{cat}</option>)}
        </select>
        <select
          value={periodIndex}
          onChange={(e) => {
            const period = FILTER_PERIODS[Number(e.target.value)];
            if (period) session.setPurchaseFilter({ period });
          }}
        >
          {FILTER_PERIODS.map((p, i) => <option key={p.kind} value={i}>{periodLabel(p)}</option>)}
        </select>
        <select
          value={purchaseSort.field}
          onChange={(e) => {
            const field = SORT_FIELDS.find((s) => s.field === e.target.value)?.field;
            if (field) session.setPurchaseSort({ ...purchaseSort, field });
          }}
        >
          {SORT_FIELDS.map((s) => <option key={s.field} value={s.field}>{s.label}</option>)}
        </select>
        <button
          className="btn btn-ghost"
          onClick={() => session.setPurchaseSort({ ...purchaseSort, ascending: !purchaseSort.ascending })}
          title="Reverse order"
        >
          {purchaseSort.ascending ? '↑' : '↓'}
        </button>
        {state.hasActivePurchaseFilters && (
          <button className="btn btn-ghost" onClick={() => session.clearPurchaseFilters()}>Clear</button>
        )}
      </div>

      <div className="budget-summary">
        <div>
          <div className="summary-label">Total</div>
          <div className="summary-value">{formatCurrency(stats.totalAmount, currency)}</div>
        </div>
        <div>
          <div className="summary-label">Purchases</div>
          <div className="summary-value">{stats.entryCount}</div>
        </div>
        <div>
          <div className="summary-label">Average</div>
          <div className="summary-value">{formatCurrency(stats.averageAmount, currency)}</div>
        </div>
      </div>
      {stats.topCategory !== null && (
        <p className="summary-label">Most spent on {stats.topCategory}</p>
      )}

      <PurchaseList
        session={session}
        purchases={purchases}
        categories={state.availableCategories}
        currency={currency}
        disabled={state.isProcessing}
      />
    </div>
  );
}
