import { useState } from 'react';
import { formatCurrency } from '../../domain/computations';

interface BudgetCardProps {
  category: string;
  amount: number;
  monthTotal: number;
  currency: string;
  disabled: boolean;
  onRename: (newName: string, amount: number) => void;
  onDelete: (propagate: boolean) => void;
}

export function BudgetCard({ category, amount, monthTotal, currency, disabled, onRename, onDelete }: BudgetCardProps) {
  const [editing, setEditing] = useState(false);
  const [name, setName] = useState(category);
  const [value, setValue] = useState(String(amount));
  const share = monthTotal > 0 ? Math.min((amount / monthTotal) * 100, 100) : 0;

  const commit = () => {
    onRename(name, Number(value));
    setEditing(false);
  };

  if (editing) {
    return (
      <div className="budget-card editing">
        <input value={name} onChange={(e) => setName(e.target.value)} aria-label="Category name" />
        <input
          type="number"
          inputMode="decimal"
          value={value}
          onChange={(e) => setValue(e.target.value)}
          aria-label="Amount"
        />
        <button className="btn btn-primary" onClick={commit} disabled={disabled}>Save</button>
        <button className="btn btn-ghost" onClick={() => setEditing(false)}>Cancel</button>
      </div>
    );
  }

  return (
    <div className="budget-card">
      <div className="budget-header">
        <span className="budget-category">{category}</span>
        <span className="budget-amount">{formatCurrency(amount, currency)}</span>
      </div>
      <div className="budget-bar-track">
        <div className="budget-bar-fill" style={{ width: `${share}%` }} />
      </div>
      <div className="budget-actions">
        <button className="btn btn-ghost" onClick={() => setEditing(true)} disabled={disabled}>Edit</button>
        <button className="btn btn-ghost" onClick={() => onDelete(false)} disabled={disabled}>Delete</button>
        <button className="btn btn-ghost" onClick={() => onDelete(true)} disabled={disabled}>
          Delete from here on
        </button>
      </div>
    </div>
  );
}
