import type { BudgetSession, SessionState } from '../../session/budgetSession';
import { formatCurrency } from '../../domain/computations';
import { BudgetCard } from '../components/BudgetCard';
import { CategoryForm } from '../components/CategoryForm';

// Shown beside their own inputs
const FORM_FIELDS = new Set(['name', 'amount', 'date', 'category', 'note']);

const MONTH_LABELS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface BudgetScreenProps {
  session: BudgetSession;
  state: SessionState;
  currency: string;
}

export function BudgetScreen({ session, state, currency }: BudgetScreenProps) {
  const { viewState, selectedYear, selectedMonth, monthlyBudgets, isProcessing } = state;
  const bucket = monthlyBudgets[selectedMonth] ?? {};
  const categories = Object.entries(bucket).sort(([a], [b]) => a.localeCompare(b));

  return (
    <div className="screen-content budget-screen">
      <div className="year-switcher">
        <button className="btn btn-ghost" onClick={() => void session.changeYear(selectedYear - 1)} disabled={isProcessing}>
          ‹
        </button>
        <span className="year-label">{selectedYear}</span>
        <button className="btn btn-ghost" onClick={() => void session.changeYear(selectedYear + 1)} disabled={isProcessing}>
          ›
        </button>
      </div>

      <div className="month-tabs">
        {MONTH_LABELS.map((label, i) => (
          <button
            key={label}
            className={`month-tab ${selectedMonth === i + 1 ? 'active' : ''}`}
            onClick={() => void session.selectMonth(i + 1)}
          >
            {label}
          </button>
        ))}
      </div>

      <div className="budget-summary">
        <div>
          <div className="summary-label">This month</div>
          <div className="summary-value">{formatCurrency(state.totalForMonth, currency)}</div>
        </div>
        <div>
          <div className="summary-label">Spent</div>
          <div className="summary-value">{formatCurrency(state.spentThisMonth, currency)}</div>
        </div>
        <div>
          <div className="summary-label">Year</div>
          <div className="summary-value">{formatCurrency(state.totalForYear, currency)}</div>
        </div>
      </div>

      {viewState.status === 'error' && (
        <div className="error-banner">
          <p>{viewState.error.message}</p>
          <button className="btn btn-primary" onClick={() => void session.retry()}>Retry</button>
        </div>
      )}

      {viewState.status === 'loading' && categories.length === 0 && <p className="no-data">Loading...</p>}
      {viewState.status === 'empty' && <p className="no-data">No categories yet. Add your first one below.</p>}

      {categories.map(([category, amount]) => (
        <BudgetCard
          key={category}
          category={category}
          amount={amount}
          monthTotal={state.totalForMonth}
          currency={currency}
          disabled={isProcessing}
          onRename={(newName, newAmount) =>
            void (newName === category
              ? session.updateCategory(selectedMonth, category, newAmount)
              : session.renameCategory(selectedMonth, category, newName, newAmount))
          }
          onDelete={(propagate) => void session.deleteCategory(category, selectedMonth, propagate)}
        />
      ))}

      {Object.entries(state.validationErrors)
        .filter(([field]) => !FORM_FIELDS.has(field))
        .map(([field, message]) => (
          <p key={field} className="field-error">{message}</p>
        ))}

      <CategoryForm session={session} state={state} />

      <div className="save-bar">
        <span className="save-status">
          {state.hasUnsavedChanges
            ? 'Unsaved changes'
            : state.lastSaveDate
              ? `Saved ${state.lastSaveDate.toLocaleTimeString()}`
              : ''}
        </span>
        <button className="btn btn-primary" onClick={() => void session.save()} disabled={!state.canSave}>
          Save
        </button>
      </div>
    </div>
  );
}
