/**
 * Budget analytics derived from monthly totals.
 * Recomputed in full after every edit; the result is replaced, never patched.
 */
import { utilization } from './computations';
import {
  ANALYTICS_THRESHOLDS,
  type AnalyticsThresholds,
  type BudgetAnalytics,
  type BudgetTrend,
  type MonthBucket,
  type MonthlyBudgets,
  type SpendingSummary,
} from './types';

export interface AnalyticsInput {
  monthlyTotals: number[];
  monthlyBudgets: MonthlyBudgets;
  currentMonthCategories: MonthBucket;
  summary: SpendingSummary;
}

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Population variance (divisor n); 0 for an empty series */
export function populationVariance(values: number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  return mean(values.map((v) => (v - avg) ** 2));
}

/**
 * Classify the most recent `trendWindow` totals.
 *
 * Month-over-month changes are relative; a month following a zero total has
 * no defined change and is skipped. Volatility is checked before direction.
 */
export function classifyTrend(
  monthlyTotals: number[],
  thresholds: AnalyticsThresholds = ANALYTICS_THRESHOLDS,
): BudgetTrend {
  if (monthlyTotals.length < 2) return 'stable';

  const window = monthlyTotals.slice(-thresholds.trendWindow);
  const changes: number[] = [];
  for (let i = 1; i < window.length; i++) {
    const prev = window[i - 1];
    if (prev > 0) {
      changes.push((window[i] - prev) / prev);
    }
  }
  if (changes.length === 0) return 'stable';

  const averageChange = mean(changes);
  const volatility = Math.sqrt(populationVariance(changes));

  if (volatility > thresholds.volatility) return 'volatile';
  if (averageChange > thresholds.trendChange) return 'increasing';
  if (averageChange < -thresholds.trendChange) return 'decreasing';
  return 'stable';
}

/** Each category's amount summed over every month */
export function categoryDistribution(monthlyBudgets: MonthlyBudgets): Record<string, number> {
  const totals: Record<string, number> = {};
  for (const bucket of Object.values(monthlyBudgets)) {
    for (const [name, amount] of Object.entries(bucket)) {
      totals[name] = (totals[name] ?? 0) + amount;
    }
  }
  return totals;
}

export function recommendations(
  input: AnalyticsInput,
  variance: number,
  thresholds: AnalyticsThresholds = ANALYTICS_THRESHOLDS,
): string[] {
  const out: string[] = [];
  const { summary } = input;
  const ratio = utilization(summary);

  if (summary.spent > summary.budgeted) {
    out.push('Consider reducing spending in high-cost categories');
  }
  if (ratio !== null && ratio < thresholds.lowUtilization) {
    out.push("You're under budget — consider increasing savings");
  }
  if (variance > thresholds.variance) {
    out.push('Consider evening out monthly budget allocations');
  }
  if (Object.keys(input.currentMonthCategories).length > thresholds.maxCategories) {
    out.push('Consider consolidating similar categories');
  }
  if (summary.budgeted === 0) {
    out.push('Set up your first budget categories');
  }
  return out;
}

export function computeAnalytics(
  input: AnalyticsInput,
  thresholds: AnalyticsThresholds = ANALYTICS_THRESHOLDS,
): BudgetAnalytics {
  const monthlyVariance = populationVariance(input.monthlyTotals);
  return {
    monthlyVariance,
    categoryDistribution: categoryDistribution(input.monthlyBudgets),
    budgetTrend: classifyTrend(input.monthlyTotals, thresholds),
    recommendations: recommendations(input, monthlyVariance, thresholds),
  };
}
