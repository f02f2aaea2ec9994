import { useEffect, useState } from 'react';
import type { BudgetSession } from '../session/budgetSession';
import type { SettingsStore } from '../session/ports';
import { DEFAULT_SETTINGS, type Settings } from '../domain/types';
import { useBudgetSession } from './hooks/useBudgetSession';
import { BudgetScreen } from './screens/BudgetScreen';
import { PurchasesScreen } from './screens/PurchasesScreen';
import { AnalyticsScreen } from './screens/AnalyticsScreen';
import { SettingsScreen } from './screens/SettingsScreen';

const SCREENS = ['budgets', 'purchases', 'analytics', 'settings'] as const;
type Screen = (typeof SCREENS)[number];

const SCREEN_LABELS: Record<Screen, string> = {
  budgets: 'Budgets',
  purchases: 'Purchases',
  analytics: 'Analytics',
  settings: 'Settings',
};

export interface AppShellProps {
  session: BudgetSession;
  settingsStore: SettingsStore;
}

export function AppShell({ session, settingsStore }: AppShellProps) {
  const state = useBudgetSession(session);
  const [screen, setScreen] = useState<Screen>('budgets');
  const [settings, setSettings] = useState<Settings>(DEFAULT_SETTINGS);

  useEffect(() => {
    settingsStore
      .getSettings()
      .then(setSettings)
      .catch((err: unknown) => console.error('[Settings] Failed to load:', err));
  }, [settingsStore]);

  useEffect(() => {
    document.documentElement.dataset.theme = settings.theme;
  }, [settings.theme]);

  // Flush pending edits before the tab goes away
  useEffect(() => {
    const onHide = () => {
      if (document.visibilityState === 'hidden') void session.flushAutoSave();
    };
    document.addEventListener('visibilitychange', onHide);
    return () => document.removeEventListener('visibilitychange', onHide);
  }, [session]);

  return (
    <div className="app-shell">
      <header className="page-header">
        <h1 className="page-title">Monthly Budget</h1>
        {state.hasUnsavedChanges && <span className="unsaved-dot" title="Unsaved changes" />}
      </header>

      <main className="page-body">
        {screen === 'budgets' && <BudgetScreen session={session} state={state} currency={settings.currency} />}
        {screen === 'purchases' && <PurchasesScreen session={session} state={state} currency={settings.currency} />}
        {screen === 'analytics' && <AnalyticsScreen state={state} currency={settings.currency} />}
        {screen === 'settings' && (
          <SettingsScreen
            session={session}
            settingsStore={settingsStore}
            settings={settings}
            onSettingsChange={setSettings}
          />
        )}
      </main>

      <nav className="tab-bar">
        {SCREENS.map((s) => (
          <button key={s} className={`tab ${screen === s ? 'active' : ''}`} onClick={() => setScreen(s)}>
            {SCREEN_LABELS[s]}
          </button>
        ))}
      </nav>
    </div>
  );
}
