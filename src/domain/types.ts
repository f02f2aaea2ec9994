/**
 * Domain types for the budget planner.
 * Pure data, no React or IO.
 */

/** Calendar month, 1 (January) through 12 (December) */
export type MonthNumber = number;

/** Category name → budgeted amount for one month */
export type MonthBucket = Record<string, number>;

/** Month number → month bucket, for a single year */
export type MonthlyBudgets = Record<MonthNumber, MonthBucket>;

/** One row of a month's budget as the persistence layer returns it */
export interface CategoryAmount {
  category: string;
  amount: number;
}

/** Logged purchase */
export interface Purchase {
  id: string;
  date: string;                // YYYY-MM-DD
  amount: number;              // non-negative
  category: string;
  note: string;
  createdAt: string;           // ISO timestamp
}

export type PurchaseInput = Omit<Purchase, 'id' | 'createdAt'>;

/** Row shape shared by purchase export and import */
export interface BudgetEntry {
  date: string;                // YYYY-MM-DD
  amount: number;
  category: string;
  note: string;
}

/** Row shape of the budget CSV (Year,Month,Category,Amount,IsHistorical) */
export interface BudgetRow {
  year: number;
  month: MonthNumber;
  category: string;
  amount: number;
  isHistorical: boolean;
}

/** Inclusive YYYY-MM-DD range */
export interface DateRange {
  start: string;
  end: string;
}

export interface CategoryValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  /** First error per input field, for inline display */
  fieldErrors: Partial<Record<'name' | 'amount', string>>;
}

export interface ValidationLimits {
  maxNameLength: number;
  minAmount: number;
  maxAmount: number;
  largeAmountThreshold: number;
}

export type BudgetTrend = 'increasing' | 'decreasing' | 'stable' | 'volatile';

export interface BudgetAnalytics {
  monthlyVariance: number;
  categoryDistribution: Record<string, number>;
  budgetTrend: BudgetTrend;
  recommendations: string[];
}

/** Budgeted vs. spent for the month being viewed */
export interface SpendingSummary {
  budgeted: number;
  spent: number;
}

export interface AnalyticsThresholds {
  trendWindow: number;
  volatility: number;
  trendChange: number;
  variance: number;
  maxCategories: number;
  lowUtilization: number;
}

export type ThemePreference = 'system' | 'light' | 'dark';
export type PurchaseReminderFrequency = 'daily' | 'weekly' | 'monthly';
export type BudgetReviewFrequency = 'monthly' | 'yearly';

/** User-configurable app settings */
export interface Settings {
  currency: string;            // ISO 4217
  theme: ThemePreference;
  notificationsEnabled: boolean;
  purchaseReminderFrequency: PurchaseReminderFrequency;
  budgetReviewFrequency: BudgetReviewFrequency;
  isFirstLaunch: boolean;
}

/** Default settings for first-time users */
export const DEFAULT_SETTINGS: Settings = {
  currency: 'USD',
  theme: 'system',
  notificationsEnabled: false,
  purchaseReminderFrequency: 'daily',
  budgetReviewFrequency: 'monthly',
  isFirstLaunch: true,
};

export const DEFAULT_LIMITS: ValidationLimits = {
  maxNameLength: 50,
  minAmount: 0,
  maxAmount: 999999.99,
  largeAmountThreshold: 10000,
};

export const ANALYTICS_THRESHOLDS: AnalyticsThresholds = {
  trendWindow: 6,
  volatility: 0.2,
  trendChange: 0.1,
  variance: 10000,
  maxCategories: 15,
  lowUtilization: 0.5,
};
