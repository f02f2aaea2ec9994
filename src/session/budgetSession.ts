/**
 * Budget editing session: the state container behind the budget screens.
 *
 * Owns one BudgetStore per selected year, runs every edit through the
 * validator, writes through the injected persistence collaborator and
 * recomputes analytics after each change. Screens subscribe for updates;
 * nothing here depends on a UI framework.
 *
 * Two independent axes describe progress: `viewState` (what the screen
 * shows) and `currentOperation` (which action is running, for disabling
 * controls). Validation failures stay local in `validationErrors`; every
 * other failure moves `viewState` to `error` and goes to the error reporter.
 *
 * The purchase log is held here too: the full list is fetched once, and
 * filtering, sorting and statistics are derived on every state build.
 */
import { debounce, type DebouncedFunc } from 'lodash';
import { budgetExportFileName, budgetRowsFor, exportFileName, formatBudgetsCsv, formatPurchasesCsv } from '../api/csvExport';
import { decodeFileContent, parseBudgetsCsv, parsePurchasesCsv, type ImportResult } from '../api/csvParser';
import { computeAnalytics } from '../domain/analytics';
import { BudgetStore, monthsFrom } from '../domain/budgetStore';
import { inRange, isValidMonth, monthRange, toDateString, totalSpent } from '../domain/computations';
import { AppError, dataLoadError, dataWriteError, toAppError, validationError } from '../domain/errors';
import {
  DEFAULT_PURCHASE_FILTER,
  DEFAULT_PURCHASE_SORT,
  filterPurchases,
  hasActiveFilters,
  normalizePurchase,
  purchaseStatistics,
  sortPurchases,
  validatePurchase,
  type PurchaseFilter,
  type PurchaseSort,
  type PurchaseStatistics,
  type PurchaseValidation,
} from '../domain/purchases';
import { periodRange, type TimePeriod } from '../domain/timePeriod';
import {
  ANALYTICS_THRESHOLDS,
  DEFAULT_LIMITS,
  type AnalyticsThresholds,
  type BudgetAnalytics,
  type BudgetEntry,
  type BudgetRow,
  type CategoryValidation,
  type MonthNumber,
  type MonthlyBudgets,
  type Purchase,
  type PurchaseInput,
  type ValidationLimits,
} from '../domain/types';
import { validateCategory } from '../domain/validation';
import { consoleErrorReporter, type BudgetPersistence, type ErrorReporter, type PurchaseStore } from './ports';

export type ViewState =
  | { status: 'idle' }
  | { status: 'loading' }
  | { status: 'loaded' }
  | { status: 'empty' }
  | { status: 'error'; error: AppError };

export type OperationTag =
  | 'load'
  | 'save'
  | 'addCategory'
  | 'updateCategory'
  | 'deleteCategory'
  | 'validate'
  | 'export'
  | 'import'
  | 'addPurchase'
  | 'updatePurchase'
  | 'deletePurchase';

export interface SessionState {
  viewState: ViewState;
  currentOperation: OperationTag | null;
  selectedYear: number;
  selectedMonth: MonthNumber;
  monthlyBudgets: MonthlyBudgets;
  totalForMonth: number;
  totalForYear: number;
  categoryCount: number;
  availableCategories: string[];
  spentThisMonth: number;
  analytics: BudgetAnalytics;
  hasUnsavedChanges: boolean;
  lastSaveDate: Date | null;
  /** Field or operation → message */
  validationErrors: Record<string, string>;
  validationWarnings: string[];
  isProcessing: boolean;
  canSave: boolean;
  /** Purchases passing `purchaseFilter`, in `purchaseSort` order */
  purchases: Purchase[];
  purchaseFilter: PurchaseFilter;
  purchaseSort: PurchaseSort;
  purchaseStatistics: PurchaseStatistics;
  hasActivePurchaseFilters: boolean;
}

export interface SessionConfig {
  autoSaveDelayMs: number;
  limits: ValidationLimits;
  thresholds: AnalyticsThresholds;
  currency: string;
}

export const SESSION_DEFAULTS: SessionConfig = {
  autoSaveDelayMs: 2000,
  limits: DEFAULT_LIMITS,
  thresholds: ANALYTICS_THRESHOLDS,
  currency: 'USD',
};

export interface BudgetSessionDeps {
  persistence: BudgetPersistence;
  purchases: PurchaseStore;
  errorReporter?: ErrorReporter;
  config?: Partial<SessionConfig>;
  now?: () => Date;
}

export interface ExportFile {
  fileName: string;
  content: string;
}

type Listener = (state: SessionState) => void;
type CsvInput = string | ArrayBuffer | Uint8Array;

const LOG = '[BudgetSession]';

function entriesKey(store: BudgetStore): string {
  return store
    .entries()
    .map(({ month, category, amount }) => `${month}\u0000${category}\u0000${amount}`)
    .sort()
    .join('\n');
}

export class BudgetSession {
  private readonly persistence: BudgetPersistence;
  private readonly purchases: PurchaseStore;
  private readonly errorReporter: ErrorReporter;
  private readonly config: SessionConfig;
  private readonly now: () => Date;
  private readonly listeners = new Set<Listener>();
  private readonly autoSave: DebouncedFunc<() => void>;

  private store: BudgetStore;
  private selectedMonth: MonthNumber;
  private spent = 0;
  private viewState: ViewState = { status: 'idle' };
  private currentOperation: OperationTag | null = null;
  private hasUnsavedChanges = false;
  private lastSaveDate: Date | null = null;
  private validationErrors: Record<string, string> = {};
  private validationWarnings: string[] = [];
  private analytics: BudgetAnalytics;
  private inFlight = 0;
  private loadGeneration = 0;
  private allPurchases: Purchase[] = [];
  private purchaseFilter: PurchaseFilter = DEFAULT_PURCHASE_FILTER;
  private purchaseSort: PurchaseSort = DEFAULT_PURCHASE_SORT;
  private state: SessionState;

  constructor(deps: BudgetSessionDeps) {
    this.persistence = deps.persistence;
    this.purchases = deps.purchases;
    this.errorReporter = deps.errorReporter ?? consoleErrorReporter;
    this.config = { ...SESSION_DEFAULTS, ...deps.config };
    this.now = deps.now ?? (() => new Date());

    const today = this.now();
    this.store = new BudgetStore(today.getFullYear());
    this.selectedMonth = today.getMonth() + 1;
    this.analytics = this.computeAnalytics();
    this.state = this.buildState();

    this.autoSave = debounce(() => {
      if (!this.state.canSave) return;
      this.save().catch((error: unknown) => {
        console.error(`${LOG} Auto-save failed:`, error);
      });
    }, this.config.autoSaveDelayMs);
  }

  // --- Observation ---

  getState(): SessionState {
    return this.state;
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- Loading ---

  /**
   * Load a year's budgets. A later call supersedes an earlier one still in
   * flight. Unsaved edits stay flagged: reads include them, and only a
   * successful save commits them.
   */
  async load(year: number = this.store.year): Promise<boolean> {
    const generation = ++this.loadGeneration;
    const result = await this.run('load', 'Loading budgets', async () => {
      const store = new BudgetStore(year);
      let spent: number;
      try {
        await store.loadYear(year, this.persistence);
        spent = await this.fetchSpent(year, this.selectedMonth);
      } catch (error) {
        if (generation !== this.loadGeneration) {
          console.warn(`${LOG} Ignoring failure of superseded load for ${year}:`, error);
          return false;
        }
        throw dataLoadError(error);
      }
      if (generation !== this.loadGeneration) {
        console.log(`${LOG} Discarding superseded load for ${year}`);
        return false;
      }

      this.store = store;
      this.spent = spent;
      this.validationErrors = {};
      this.validationWarnings = [];
      this.analytics = this.computeAnalytics();
      return true;
    });
    if (result && this.hasUnsavedChanges) {
      this.scheduleAutoSave();
    }
    return result ?? false;
  }

  retry(): Promise<boolean> {
    return this.load(this.store.year);
  }

  /** Switch years, saving pending edits first; stays put if that save fails */
  async changeYear(year: number): Promise<boolean> {
    if (year === this.store.year) return true;
    if (this.hasUnsavedChanges && !(await this.save())) {
      return false;
    }
    return this.load(year);
  }

  async selectMonth(month: MonthNumber): Promise<boolean> {
    if (!isValidMonth(month)) {
      this.setValidationErrors({ month: `Month must be between 1 and 12 (got ${month})` });
      return false;
    }
    this.selectedMonth = month;
    const result = await this.run('load', 'Loading purchases', async () => {
      try {
        this.spent = await this.fetchSpent(this.store.year, month);
      } catch (error) {
        throw dataLoadError(error, 'purchases');
      }
      this.analytics = this.computeAnalytics();
      return true;
    });
    return result ?? false;
  }

  // --- Validation ---

  /**
   * Live validation for the category form; results land in
   * `validationErrors` / `validationWarnings` as well as being returned.
   */
  validateCategory(
    name: string,
    amount: number,
    month: MonthNumber = this.selectedMonth,
    ignoreName?: string,
  ): CategoryValidation {
    const existing = isValidMonth(month)
      ? this.store.categoryNames(month).filter((n) => n !== ignoreName)
      : [];
    const result = validateCategory(name, amount, existing, this.config.limits, this.config.currency);
    this.validationErrors = { ...result.fieldErrors };
    this.validationWarnings = result.warnings;
    this.emit();
    return result;
  }

  /** Check every stored triple; problems are reported in `validationErrors` */
  async validateAllBudgets(): Promise<boolean> {
    const result = await this.run('validate', 'Validating budgets', async () => {
      this.assertStoreValid();
      this.validationErrors = {};
      return true;
    });
    return result ?? false;
  }

  // --- Category edits ---

  async addCategory(
    month: MonthNumber,
    name: string,
    amount: number,
    propagateToFutureMonths = false,
  ): Promise<boolean> {
    const validation = this.validateCategory(name, amount, month);
    if (!validation.isValid) return false;
    const trimmed = name.trim();

    const result = await this.run('addCategory', 'Adding category', async () => {
      const year = this.store.year;
      const months = monthsFrom(month, propagateToFutureMonths);
      await this.writeBudgets(year, async () => {
        for (const m of months) {
          await this.persistence.addCategory(trimmed, amount, m, year);
        }
      });
      this.store.addCategory(month, trimmed, amount, propagateToFutureMonths);
      this.markChanged();
      return true;
    });
    return result ?? false;
  }

  async updateCategory(month: MonthNumber, name: string, amount: number): Promise<boolean> {
    const validation = this.validateCategory(name, amount, month, name);
    if (!validation.isValid) return false;

    const result = await this.run('updateCategory', 'Updating category', async () => {
      if (!this.store.categoryNames(month).includes(name)) {
        throw validationError(`Category "${name}" does not exist in month ${month}`);
      }
      const year = this.store.year;
      await this.writeBudgets(year, () => this.persistence.updateCategoryAmount(name, amount, month, year));
      this.store.updateCategory(month, name, amount);
      this.markChanged();
      return true;
    });
    return result ?? false;
  }

  /**
   * Rename and re-amount a category; an amount of zero deletes it.
   * The new name is written before the old one is removed.
   */
  async renameCategory(
    month: MonthNumber,
    oldName: string,
    newName: string,
    amount: number,
    propagateToFutureMonths = false,
  ): Promise<boolean> {
    const validation = this.validateCategory(newName, amount, month, oldName);
    if (!validation.isValid) return false;
    const trimmed = newName.trim();

    const result = await this.run('updateCategory', 'Updating category', async () => {
      const year = this.store.year;
      const months = monthsFrom(month, propagateToFutureMonths);
      await this.writeBudgets(year, async () => {
        if (amount !== 0) {
          for (const m of months) {
            await this.persistence.addCategory(trimmed, amount, m, year);
          }
        }
        if (amount === 0 || trimmed !== oldName) {
          await this.persistence.deleteMonthlyBudget(oldName, month, year, propagateToFutureMonths);
        }
      });
      this.store.renameAndUpdate(month, oldName, trimmed, amount, propagateToFutureMonths);
      this.markChanged();
      return true;
    });
    return result ?? false;
  }

  async deleteCategory(name: string, fromMonth: MonthNumber, propagateToFutureMonths = false): Promise<boolean> {
    const result = await this.run('deleteCategory', 'Deleting category', async () => {
      if (!isValidMonth(fromMonth)) {
        throw validationError(`Month must be between 1 and 12 (got ${fromMonth})`);
      }
      const year = this.store.year;
      await this.writeBudgets(year, () =>
        this.persistence.deleteMonthlyBudget(name, fromMonth, year, propagateToFutureMonths),
      );
      this.store.deleteCategory(name, fromMonth, propagateToFutureMonths);
      this.markChanged();
      return true;
    });
    return result ?? false;
  }

  /** Replace the selected year's budgets with a copy of another year's */
  async copyFromYear(sourceYear: number): Promise<boolean> {
    const result = await this.run('import', 'Copying budgets', async () => {
      const source = new BudgetStore(sourceYear);
      try {
        await source.loadYear(sourceYear, this.persistence);
      } catch (error) {
        throw dataLoadError(error);
      }
      const year = this.store.year;
      await this.writeBudgets(year, async () => {
        for (const { month, category } of this.store.entries()) {
          await this.persistence.deleteMonthlyBudget(category, month, year, false);
        }
        for (const { month, category, amount } of source.entries()) {
          await this.persistence.addCategory(category, amount, month, year);
        }
      });
      this.store.copyYear(source.snapshot());
      this.markChanged();
      console.log(`${LOG} Copied ${sourceYear} budgets into ${year}`);
      return true;
    });
    return result ?? false;
  }

  // --- Saving ---

  /** Commit pending edits. Resolves true when saved or when nothing was pending. */
  async save(): Promise<boolean> {
    if (!this.hasUnsavedChanges) return true;
    this.autoSave.cancel();

    const result = await this.run('save', 'Saving budgets', async () => {
      this.assertStoreValid();
      await this.write(() => this.persistence.saveCurrentState());
      this.hasUnsavedChanges = false;
      this.lastSaveDate = this.now();
      this.validationErrors = {};
      return true;
    });
    return result ?? false;
  }

  /** Restart the quiet-period timer; the save runs once edits stop */
  scheduleAutoSave(): void {
    this.autoSave();
  }

  /** Run a pending auto-save now instead of waiting for the timer */
  async flushAutoSave(): Promise<boolean> {
    this.autoSave.cancel();
    if (!this.state.canSave) return !this.hasUnsavedChanges;
    return this.save();
  }

  dispose(): void {
    this.autoSave.cancel();
    this.listeners.clear();
  }

  // --- Purchases ---

  /** Fetch the whole purchase log; filters apply on top of it */
  async loadPurchases(): Promise<boolean> {
    const result = await this.run('load', 'Loading purchases', async () => {
      await this.refreshPurchases();
      return true;
    });
    return result ?? false;
  }

  /** Live validation for the purchase form */
  validatePurchase(input: PurchaseInput): PurchaseValidation {
    const result = validatePurchase(
      input,
      toDateString(this.now()),
      this.store.availableCategories(),
      this.config.limits,
    );
    this.validationErrors = { ...result.fieldErrors };
    this.validationWarnings = result.warnings;
    this.emit();
    return result;
  }

  async addPurchase(input: PurchaseInput): Promise<boolean> {
    if (!this.validatePurchase(input).isValid) return false;

    const result = await this.run('addPurchase', 'Adding purchase', async () => {
      const purchase = await this.write(() => this.purchases.addPurchase(normalizePurchase(input)), 'purchase');
      this.allPurchases = [...this.allPurchases, purchase];
      await this.refreshSpent();
      return true;
    });
    return result ?? false;
  }

  async updatePurchase(id: string, input: PurchaseInput): Promise<boolean> {
    if (!this.validatePurchase(input).isValid) return false;

    const result = await this.run('updatePurchase', 'Updating purchase', async () => {
      const updated = await this.write(
        () => this.purchases.updatePurchase(id, normalizePurchase(input)),
        'purchase',
      );
      this.allPurchases = this.allPurchases.map((p) => (p.id === id ? updated : p));
      await this.refreshSpent();
      return true;
    });
    return result ?? false;
  }

  async deletePurchase(id: string): Promise<boolean> {
    const result = await this.run('deletePurchase', 'Deleting purchase', async () => {
      await this.write(() => this.purchases.deletePurchase(id), 'purchase');
      this.allPurchases = this.allPurchases.filter((p) => p.id !== id);
      await this.refreshSpent();
      return true;
    });
    return result ?? false;
  }

  setPurchaseFilter(patch: Partial<PurchaseFilter>): void {
    this.purchaseFilter = { ...this.purchaseFilter, ...patch };
    this.emit();
  }

  setPurchaseSort(sort: PurchaseSort): void {
    this.purchaseSort = sort;
    this.emit();
  }

  clearPurchaseFilters(): void {
    this.purchaseFilter = DEFAULT_PURCHASE_FILTER;
    this.purchaseSort = DEFAULT_PURCHASE_SORT;
    this.emit();
  }

  // --- CSV ---

  async exportPurchases(period: TimePeriod): Promise<ExportFile | null> {
    const result = await this.run('export', 'Exporting data', async () => {
      const now = this.now();
      const purchases = await this.purchases.getPurchases(periodRange(period, now));
      const entries: BudgetEntry[] = [...purchases]
        .sort((a, b) => a.date.localeCompare(b.date))
        .map(({ date, amount, category, note }) => ({ date, amount, category, note }));
      return { fileName: exportFileName(period, now), content: formatPurchasesCsv(entries) };
    });
    return result ?? null;
  }

  async exportBudgets(): Promise<ExportFile | null> {
    const result = await this.run('export', 'Exporting data', async () => {
      const now = this.now();
      const year = this.store.year;
      const rows = budgetRowsFor(year, this.store.snapshot(), year < now.getFullYear());
      return {
        fileName: budgetExportFileName(year, now),
        content: formatBudgetsCsv(rows),
      };
    });
    return result ?? null;
  }

  async importPurchases(input: CsvInput): Promise<ImportResult<BudgetEntry> | null> {
    const result = await this.run('import', 'Importing data', async () => {
      const parsed = parsePurchasesCsv(this.decode(input), this.store.availableCategories());
      await this.write(() => this.purchases.bulkAddPurchases(parsed.data), 'purchases');
      await this.refreshPurchases();
      console.log(`${LOG} Imported ${parsed.data.length} purchase(s), ${parsed.warnings.length} row(s) skipped`);
      return parsed;
    });
    return result ?? null;
  }

  /**
   * Import budget rows. Rows for the selected year update the open store;
   * rows for other years are written straight through.
   */
  async importBudgets(input: CsvInput): Promise<ImportResult<BudgetRow> | null> {
    const result = await this.run('import', 'Importing data', async () => {
      const parsed = parseBudgetsCsv(this.decode(input), this.store.availableCategories());
      const year = this.store.year;
      await this.writeBudgets(year, async () => {
        for (const row of parsed.data) {
          await this.persistence.addCategory(row.category, row.amount, row.month, row.year);
        }
      });
      for (const row of parsed.data) {
        if (row.year === year) {
          this.store.addCategory(row.month, row.category, row.amount, false);
        }
      }
      this.markChanged();
      console.log(`${LOG} Imported ${parsed.data.length} budget row(s), ${parsed.warnings.length} row(s) skipped`);
      return parsed;
    });
    return result ?? null;
  }

  // --- Internals ---

  /**
   * Uniform wrapper for every async operation: tags the operation, shows
   * loading, then settles viewState. Resolves undefined on failure.
   */
  private async run<T>(tag: OperationTag, context: string, work: () => Promise<T>): Promise<T | undefined> {
    const started = performance.now();
    this.inFlight++;
    this.currentOperation = tag;
    if (this.viewState.status !== 'loading') {
      this.viewState = { status: 'loading' };
    }
    this.emit();

    try {
      const value = await work();
      this.settle();
      return value;
    } catch (err) {
      const error = toAppError(err);
      if (error.kind === 'validation') {
        this.validationErrors = { ...this.validationErrors, [tag]: error.message };
        this.settle();
      } else {
        this.settle(error);
        this.errorReporter.handle(error, context);
      }
      return undefined;
    } finally {
      console.debug(`${LOG} ${tag} finished in ${Math.round(performance.now() - started)}ms`);
    }
  }

  /**
   * An error shows at once; the operation tag clears only when nothing else
   * is in flight. An error raised alongside another operation stays shown
   * after that operation succeeds.
   */
  private settle(error?: AppError): void {
    this.inFlight--;
    if (error) {
      this.viewState = { status: 'error', error };
    }
    if (this.inFlight === 0) {
      this.currentOperation = null;
      if (this.viewState.status === 'loading') {
        this.viewState = this.store.hasAnyCategories() ? { status: 'loaded' } : { status: 'empty' };
      }
    }
    this.emit();
  }

  /** Run a persistence write, classifying failures as write errors */
  private async write<T>(fn: () => Promise<T>, subject?: string): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw error instanceof AppError ? error : dataWriteError(error, subject);
    }
  }

  /**
   * Budget writes can take several calls. When one fails, the year is read
   * back so the store shows exactly what reached storage.
   */
  private async writeBudgets(year: number, fn: () => Promise<void>): Promise<void> {
    try {
      await this.write(fn);
    } catch (error) {
      await this.resync(year);
      throw error;
    }
  }

  private async resync(year: number): Promise<void> {
    const store = new BudgetStore(year);
    try {
      await store.loadYear(year, this.persistence);
    } catch (error) {
      console.warn(`${LOG} Could not reload ${year} after a failed write:`, error);
      return;
    }
    if (year !== this.store.year || entriesKey(store) === entriesKey(this.store)) return;

    console.warn(`${LOG} Write to ${year} stopped partway; showing what was stored`);
    this.store = store;
    this.hasUnsavedChanges = true;
    this.analytics = this.computeAnalytics();
  }

  private assertStoreValid(): void {
    for (const { month, category, amount } of this.store.entries()) {
      if (category.trim() === '') {
        throw validationError(`Month ${month} has a category with an empty name`);
      }
      if (!(amount >= 0)) {
        throw validationError(`"${category}" in month ${month} has a negative amount`);
      }
    }
  }

  private decode(input: CsvInput): string {
    return typeof input === 'string' ? input : decodeFileContent(input);
  }

  private async fetchSpent(year: number, month: MonthNumber): Promise<number> {
    return totalSpent(await this.purchases.getPurchases(monthRange(year, month)));
  }

  private async refreshPurchases(): Promise<void> {
    try {
      this.allPurchases = await this.purchases.getPurchases();
    } catch (error) {
      throw dataLoadError(error, 'purchases');
    }
    this.spent = totalSpent(inRange(this.allPurchases, monthRange(this.store.year, this.selectedMonth)));
    this.analytics = this.computeAnalytics();
  }

  private async refreshSpent(): Promise<void> {
    try {
      this.spent = await this.fetchSpent(this.store.year, this.selectedMonth);
    } catch (error) {
      throw dataLoadError(error, 'purchases');
    }
    this.analytics = this.computeAnalytics();
  }

  private markChanged(): void {
    this.hasUnsavedChanges = true;
    this.analytics = this.computeAnalytics();
    this.scheduleAutoSave();
  }

  private setValidationErrors(errors: Record<string, string>): void {
    this.validationErrors = errors;
    this.emit();
  }

  private computeAnalytics(): BudgetAnalytics {
    const month = this.selectedMonth;
    return computeAnalytics(
      {
        monthlyTotals: this.store.monthlyTotals(),
        monthlyBudgets: this.store.snapshot(),
        currentMonthCategories: this.store.monthBucket(month),
        summary: { budgeted: this.store.totalForMonth(month), spent: this.spent },
      },
      this.config.thresholds,
    );
  }

  private buildState(): SessionState {
    const month = this.selectedMonth;
    const isProcessing = this.currentOperation !== null || this.viewState.status === 'loading';
    const purchases = sortPurchases(
      filterPurchases(this.allPurchases, this.purchaseFilter, this.now()),
      this.purchaseSort,
    );
    return {
      viewState: this.viewState,
      currentOperation: this.currentOperation,
      selectedYear: this.store.year,
      selectedMonth: month,
      monthlyBudgets: this.store.snapshot(),
      totalForMonth: this.store.totalForMonth(month),
      totalForYear: this.store.totalForYear(),
      categoryCount: this.store.categoryCount(month),
      availableCategories: this.store.availableCategories(),
      spentThisMonth: this.spent,
      analytics: this.analytics,
      hasUnsavedChanges: this.hasUnsavedChanges,
      lastSaveDate: this.lastSaveDate,
      validationErrors: this.validationErrors,
      validationWarnings: this.validationWarnings,
      isProcessing,
      canSave: this.hasUnsavedChanges && !isProcessing && this.viewState.status !== 'error',
      purchases,
      purchaseFilter: this.purchaseFilter,
      purchaseSort: this.purchaseSort,
      purchaseStatistics: purchaseStatistics(purchases),
      hasActivePurchaseFilters: hasActiveFilters(this.purchaseFilter),
    };
  }

  private emit(): void {
    this.state = this.buildState();
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }
}
