import { useEffect, useRef, useState } from 'react';
import type { BudgetSession, ExportFile } from '../../session/budgetSession';
import type { SettingsStore } from '../../session/ports';
import { periodLabel, type TimePeriod } from '../../domain/timePeriod';
import type { BudgetReviewFrequency, PurchaseReminderFrequency, Settings, ThemePreference } from '../../domain/types';

const EXPORT_PERIODS: TimePeriod[] = [
  { kind: 'thisMonth' },
  { kind: 'lastMonth' },
  { kind: 'thisYear' },
  { kind: 'lastYear' },
  { kind: 'last30Days' },
  { kind: 'last90Days' },
  { kind: 'last12Months' },
  { kind: 'allTime' },
];

const CURRENCIES = ['USD', 'EUR', 'GBP', 'JPY', 'CAD', 'AUD'];
const THEMES: ThemePreference[] = ['system', 'light', 'dark'];
const REMINDER_FREQUENCIES: PurchaseReminderFrequency[] = ['daily', 'weekly', 'monthly'];
const REVIEW_FREQUENCIES: BudgetReviewFrequency[] = ['monthly', 'yearly'];

function downloadCsv(file: ExportFile): void {
  const blob = new Blob([file.content], { type: 'text/csv;charset=utf-8' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = file.fileName;
  a.click();
  URL.revokeObjectURL(url);
}

interface SettingsScreenProps {
  session: BudgetSession;
  settingsStore: SettingsStore;
  settings: Settings;
  onSettingsChange: (settings: Settings) => void;
}

export function SettingsScreen({ session, settingsStore, settings, onSettingsChange }: SettingsScreenProps) {
  const [periodIndex, setPeriodIndex] = useState(0);
  const [message, setMessage] = useState<string | null>(null);
  const [importWarnings, setImportWarnings] = useState<string[]>([]);
  const purchaseInput = useRef<HTMLInputElement>(null);
  const budgetInput = useRef<HTMLInputElement>(null);

  useEffect(() => {
    if (settings.isFirstLaunch) {
      settingsStore
        .updateSettings({ isFirstLaunch: false })
        .then(onSettingsChange)
        .catch((err: unknown) => console.error('[Settings] Failed to clear first-launch flag:', err));
    }
  }, [settings.isFirstLaunch, settingsStore, onSettingsChange]);

  const update = async (patch: Partial<Settings>) => {
    try {
      onSettingsChange(await settingsStore.updateSettings(patch));
    } catch (err) {
      console.error('[Settings] Update failed:', err);
      setMessage('Failed to save settings');
    }
  };

  const handleExportPurchases = async () => {
    const file = await session.exportPurchases(EXPORT_PERIODS[periodIndex]);
    if (file) downloadCsv(file);
  };

  const handleExportBudgets = async () => {
    const file = await session.exportBudgets();
    if (file) downloadCsv(file);
  };

  const handleImport = async (kind: 'purchases' | 'budgets', files: FileList | null) => {
    const file = files?.[0];
    if (!file) return;
    const bytes = new Uint8Array(await file.arrayBuffer());
    const result = kind === 'purchases' ? await session.importPurchases(bytes) : await session.importBudgets(bytes);
    if (result) {
      setMessage(`Imported ${result.data.length} row(s), ${result.newCategories.length} new categor${result.newCategories.length === 1 ? 'y' : 'ies'}`);
      setImportWarnings(result.warnings);
    } else {
      setMessage('Import failed');
      setImportWarnings([]);
    }
  };

  return (
    <div className="screen-content settings-screen">
      <section className="settings-section">
        <h3>Preferences</h3>
        <label className="settings-row">
          Currency
          <select value={settings.currency} onChange={(e) => void update({ currency: e.target.value })}>
            {CURRENCIES.map((c) => <option key={c} value={c}>{c}</option>)}
          </select>
        </label>
        <label className="settings-row">
          Theme
          <select
            value={settings.theme}
            onChange={(e) => {
              const theme = THEMES.find((t) => t === e.target.value);
              if (theme) void update({ theme });
            }}
          >
            {THEMES.map((t) => <option key={t} value={t}>{t}</option>)}
          </select>
        </label>
        <label className="settings-row">
          Notifications
          <input
            type="checkbox"
            checked={settings.notificationsEnabled}
            onChange={(e) => void update({ notificationsEnabled: e.target.checked })}
          />
        </label>
        <label className="settings-row">
          Purchase reminders
          <select
            value={settings.purchaseReminderFrequency}
            disabled={!settings.notificationsEnabled}
            onChange={(e) => {
              const purchaseReminderFrequency = REMINDER_FREQUENCIES.find((f) => f === e.target.value);
              if (purchaseReminderFrequency) void update({ purchaseReminderFrequency });
            }}
          >
            {REMINDER_FREQUENCIES.map((f) => <option key={f} value={f}>{f}</option>)}
          </select>
        </label>
        <label className="settings-row">
          Budget review
          <select
            value={settings.budgetReviewFrequency}
            disabled={!settings.notificationsEnabled}
            onChange={(e) => {
              const budgetReviewFrequency = REVIEW_FREQUENCIES.find((f) => f === e.target.value);
              if (budgetReviewFrequency) void update({ budgetReviewFrequency });
            }}
          >
            {REVIEW_FREQUENCIES.map((f) => <option key={f} value={f}>{f}</option>)}
          </select>
        </label>
      </section>

      <section className="settings-section">
        <h3>Export</h3>
        <select value={periodIndex} onChange={(e) => setPeriodIndex(Number(e.target.value))}>
          {EXPORT_PERIODS.map((p, i) => <option key={p.kind} value={i}>{periodLabel(p)}</option>)}
        </select>
        <button className="btn btn-secondary" onClick={() => void handleExportPurchases()}>Export purchases</button>
        <button className="btn btn-secondary" onClick={() => void handleExportBudgets()}>Export budgets</button>
      </section>

      <section className="settings-section">
        <h3>Import</h3>
        <input
          ref={purchaseInput}
          type="file"
          accept=".csv,text/csv"
          hidden
          onChange={(e) => void handleImport('purchases', e.target.files)}
        />
        <input
          ref={budgetInput}
          type="file"
          accept=".csv,text/csv"
          hidden
          onChange={(e) => void handleImport('budgets', e.target.files)}
        />
        <button className="btn btn-secondary" onClick={() => purchaseInput.current?.click()}>Import purchases</button>
        <button className="btn btn-secondary" onClick={() => budgetInput.current?.click()}>Import budgets</button>
        {message && <p className="settings-message">{message}</p>}
        {importWarnings.length > 0 && (
          <ul className="import-warnings">
            {importWarnings.map((w) => <li key={w}>{w}</li>)}
          </ul>
        )}
      </section>
    </div>
  );
}
