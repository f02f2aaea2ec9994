import { useMemo } from 'react';
import type { SessionState } from '../../session/budgetSession';
import { formatCurrency, utilization } from '../../domain/computations';
import type { BudgetTrend } from '../../domain/types';

const TREND_LABELS: Record<BudgetTrend, string> = {
  increasing: 'Increasing',
  decreasing: 'Decreasing',
  stable: 'Stable',
  volatile: 'Volatile',
};

export interface AnalyticsScreenProps {
  state: SessionState;
  currency: string;
}

export function AnalyticsScreen({ state, currency }: AnalyticsScreenProps) {
  const { analytics, totalForMonth, totalForYear: yearTotal, spentThisMonth } = state;
  const used = utilization({ budgeted: totalForMonth, spent: spentThisMonth });

  const distribution = useMemo(
    () => Object.entries(analytics.categoryDistribution).sort(([, a], [, b]) => b - a),
    [analytics.categoryDistribution],
  );

  return (
    <div className="screen-content analytics-screen">
      <div className="analytics-summary-cards">
        <div className="analytics-card">
          <div className="analytics-card-label">Trend</div>
          <div className={`analytics-card-value trend-${analytics.budgetTrend}`}>
            {TREND_LABELS[analytics.budgetTrend]}
          </div>
        </div>
        <div className="analytics-card">
          <div className="analytics-card-label">Monthly variance</div>
          <div className="analytics-card-value">{analytics.monthlyVariance.toFixed(2)}</div>
        </div>
        <div className="analytics-card">
          <div className="analytics-card-label">Used</div>
          <div className="analytics-card-value">
            {used === null ? '—' : `${Math.round(used * 100)}%`}
          </div>
        </div>
      </div>

      <section className="analytics-section">
        <h3>Yearly totals by category</h3>
        {distribution.length === 0 && <p className="no-data">No categories this year</p>}
        {distribution.map(([category, total]) => (
          <div key={category} className="distribution-row">
            <span>{category}</span>
            <span>{yearTotal > 0 ? `${((total / yearTotal) * 100).toFixed(1)}%` : ''}</span>
            <span>{formatCurrency(total, currency)}</span>
          </div>
        ))}
      </section>

      <section className="analytics-section">
        <h3>Recommendations</h3>
        {analytics.recommendations.length === 0 ? (
          <p className="no-data">Nothing to flag</p>
        ) : (
          <ul className="recommendations">
            {analytics.recommendations.map((r) => <li key={r}>{r}</li>)}
          </ul>
        )}
      </section>
    </div>
  );
}
