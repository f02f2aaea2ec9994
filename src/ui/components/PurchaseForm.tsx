import { useState } from 'react';
import type { BudgetSession, SessionState } from '../../session/budgetSession';
import { toDateString } from '../../domain/computations';
import type { PurchaseInput } from '../../domain/types';

interface PurchaseFormProps {
  session: BudgetSession;
  state: SessionState;
}

export function PurchaseForm({ session, state }: PurchaseFormProps) {
  const today = toDateString(new Date());

  const [date, setDate] = useState(today);
  const [amount, setAmount] = useState('');
  const [category, setCategory] = useState('');
  const [note, setNote] = useState('');
  const [success, setSuccess] = useState(false);

  const { validationErrors, validationWarnings } = state;

  const toInput = (patch: Partial<Record<'date' | 'amount' | 'category' | 'note', string>>): PurchaseInput => {
    const next = { date, amount, category, note, ...patch };
    return {
      date: next.date,
      amount: next.amount.trim() === '' ? Number.NaN : Number(next.amount),
      category: next.category,
      note: next.note,
    };
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    setSuccess(false);

    const added = await session.addPurchase(toInput({}));
    if (added) {
      setSuccess(true);
      setAmount('');
      setNote('');
      // Clear success message after 3 seconds
      setTimeout(() => setSuccess(false), 3000);
    }
  };

  return (
    <div className="purchase-entry">
      <h3>Log a purchase</h3>
      <form onSubmit={(e) => void handleSubmit(e)}>
        <div className="form-row">
          <label htmlFor="purchase-date">Date *</label>
          <input
            id="purchase-date"
            type="date"
            value={date}
            max={today}
            onChange={(e) => {
              setDate(e.target.value);
              session.validatePurchase(toInput({ date: e.target.value }));
            }}
            aria-invalid={validationErrors.date !== undefined}
            required
          />
          {validationErrors.date && <p className="field-error">{validationErrors.date}</p>}
        </div>
        <div className="form-row">
          <label htmlFor="purchase-amount">Amount *</label>
          <input
            id="purchase-amount"
            type="number"
            inputMode="decimal"
            min="0.01"
            step="0.01"
            value={amount}
            onChange={(e) => {
              setAmount(e.target.value);
              session.validatePurchase(toInput({ amount: e.target.value }));
            }}
            placeholder="e.g. 12.50"
            aria-invalid={validationErrors.amount !== undefined}
            required
          />
          {validationErrors.amount && <p className="field-error">{validationErrors.amount}</p>}
        </div>
        <div className="form-row">
          <label htmlFor="purchase-category">Category *</label>
          <input
            id="purchase-category"
            type="text"
            value={category}
            onChange={(e) => {
              setCategory(e.target.value);
              session.validatePurchase(toInput({ category: e.target.value }));
            }}
            placeholder="e.g. Groceries"
            list="purchase-category-list"
            aria-invalid={validationErrors.category !== undefined}
            required
          />
          <datalist id="purchase-category-list">
            {state.availableCategories.map((cat) => (
              <option key={cat} value={cat} />
            ))}
          </datalist>
          {validationErrors.category && <p className="field-error">{validationErrors.category}</p>}
        </div>
        <div className="form-row">
          <label htmlFor="purchase-note">Note</label>
          <input
            id="purchase-note"
            type="text"
            value={note}
            onChange={(e) => {
              setNote(e.target.value);
              session.validatePurchase(toInput({ note: e.target.value }));
            }}
            placeholder="e.g. Weekly shop"
          />
          {validationErrors.note && <p className="field-error">{validationErrors.note}</p>}
        </div>
        {validationWarnings.map((w) => (
          <p key={w} className="field-warning">{w}</p>
        ))}
        <button type="submit" className="btn btn-primary" disabled={state.isProcessing}>
          {state.currentOperation === 'addPurchase' ? 'Saving...' : 'Add'}
        </button>
      </form>
      {success && <p className="status success">Purchase saved</p>}
    </div>
  );
}
