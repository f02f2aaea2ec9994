import { useState } from 'react';
import type { BudgetSession, SessionState } from '../../session/budgetSession';

interface CategoryFormProps {
  session: BudgetSession;
  state: SessionState;
}

export function CategoryForm({ session, state }: CategoryFormProps) {
  const [name, setName] = useState('');
  const [amount, setAmount] = useState('');
  const [propagate, setPropagate] = useState(false);

  const parsedAmount = amount.trim() === '' ? Number.NaN : Number(amount);
  const { validationErrors, validationWarnings } = state;

  const handleChange = (nextName: string, nextAmount: string) => {
    setName(nextName);
    setAmount(nextAmount);
    session.validateCategory(nextName, nextAmount.trim() === '' ? Number.NaN : Number(nextAmount));
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    const added = await session.addCategory(state.selectedMonth, name, parsedAmount, propagate);
    if (added) {
      setName('');
      setAmount('');
    }
  };

  return (
    <form className="category-form" onSubmit={(e) => void handleSubmit(e)}>
      <div className="form-row">
        <input
          placeholder="Category"
          value={name}
          onChange={(e) => handleChange(e.target.value, amount)}
          aria-invalid={validationErrors.name !== undefined}
        />
        {validationErrors.name && <p className="field-error">{validationErrors.name}</p>}
      </div>
      <div className="form-row">
        <input
          type="number"
          inputMode="decimal"
          placeholder="Amount"
          value={amount}
          onChange={(e) => handleChange(name, e.target.value)}
          aria-invalid={validationErrors.amount !== undefined}
        />
        {validationErrors.amount && <p className="field-error">{validationErrors.amount}</p>}
      </div>
      <label className="form-check">
        <input type="checkbox" checked={propagate} onChange={(e) => setPropagate(e.target.checked)} />
        Apply to the rest of the year
      </label>
      {validationWarnings.map((w) => (
        <p key={w} className="field-warning">{w}</p>
      ))}
      <button type="submit" className="btn btn-primary" disabled={state.isProcessing}>
        Add category
      </button>
    </form>
  );
}
