import { useState } from 'react';
import type { BudgetSession } from '../../session/budgetSession';
import { formatCurrency } from '../../domain/computations';
import type { Purchase } from '../../domain/types';

interface PurchaseListProps {
  session: BudgetSession;
  purchases: Purchase[];
  categories: string[];
  currency: string;
  disabled: boolean;
}

interface Draft {
  amount: string;
  category: string;
  note: string;
}

export function PurchaseList({ session, purchases, categories, currency, disabled }: PurchaseListProps) {
  const [editingId, setEditingId] = useState<string | null>(null);
  const [draft, setDraft] = useState<Draft>({ amount: '', category: '', note: '' });

  const startEdit = (purchase: Purchase) => {
    setEditingId(purchase.id);
    setDraft({ amount: String(purchase.amount), category: purchase.category, note: purchase.note });
  };

  const saveEdit = async (purchase: Purchase) => {
    const saved = await session.updatePurchase(purchase.id, {
      date: purchase.date,
      amount: draft.amount.trim() === '' ? Number.NaN : Number(draft.amount),
      category: draft.category,
      note: draft.note,
    });
    if (saved) setEditingId(null);
  };

  const handleKeyDown = (e: React.KeyboardEvent, purchase: Purchase) => {
    if (e.key === 'Enter') {
      void saveEdit(purchase);
    } else if (e.key === 'Escape') {
      setEditingId(null);
    }
  };

  if (purchases.length === 0) {
    return <p className="no-data">No purchases for this view</p>;
  }

  return (
    <div className="purchase-list">
      <table>
        <thead>
          <tr>
            <th>Date</th>
            <th>Amount</th>
            <th>Category</th>
            <th>Note</th>
            <th />
          </tr>
        </thead>
        <tbody>
          {purchases.map((p) =>
            editingId === p.id ? (
              <tr key={p.id} className="row-editing">
                <td>{p.date}</td>
                <td>
                  <input
                    type="number"
                    inputMode="decimal"
                    value={draft.amount}
                    onChange={(e) => setDraft({ ...draft, amount: e.target.value })}
                    onKeyDown={(e) => handleKeyDown(e, p)}
                    disabled={disabled}
                    autoFocus
                  />
                </td>
                <td>
                  <input
                    type="text"
                    value={draft.category}
                    onChange={(e) => setDraft({ ...draft, category: e.target.value })}
                    onKeyDown={(e) => handleKeyDown(e, p)}
                    disabled={disabled}
                    list="purchase-edit-list"
                  />
                </td>
                <td>
                  <input
                    type="text"
                    value={draft.note}
                    onChange={(e) => setDraft({ ...draft, note: e.target.value })}
                    onKeyDown={(e) => handleKeyDown(e, p)}
                    disabled={disabled}
                  />
                </td>
                <td className="row-actions">
                  <button className="btn btn-primary" onClick={() => void saveEdit(p)} disabled={disabled}>Save</button>
                  <button className="btn btn-ghost" onClick={() => setEditingId(null)}>Cancel</button>
                </td>
              </tr>
            ) : (
              <tr key={p.id}>
                <td>{p.date}</td>
                <td className="expense">{formatCurrency(p.amount, currency)}</td>
                <td className="category-cell">
                  <span className="editable" onClick={() => startEdit(p)} title="Click to edit">
                    {p.category}
                  </span>
                </td>
                <td>{p.note}</td>
                <td className="row-actions">
                  <button className="btn btn-ghost" onClick={() => void session.deletePurchase(p.id)} disabled={disabled}>
                    Delete
                  </button>
                </td>
              </tr>
            ),
          )}
        </tbody>
      </table>
      <datalist id="purchase-edit-list">
        {categories.map((cat) => (
          <option key={cat} value={cat} />
        ))}
      </datalist>
    </div>
  );
}
