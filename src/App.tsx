import { useEffect, useMemo } from 'react';
import { HttpBudgetClient } from './api/client';
import { createDatabase } from './db/database';
import { DexieBudgetRepository } from './db/repo';
import { BudgetSession } from './session/budgetSession';
import type { BudgetPersistence, PurchaseStore, SettingsStore } from './session/ports';
import { AppShell } from './ui/AppShell';

type Backend = BudgetPersistence & PurchaseStore & SettingsStore;

// VITE_STORAGE=api talks to the Express server instead of IndexedDB
function createBackend(): Backend {
  if (import.meta.env.VITE_STORAGE === 'api') {
    console.log('[App] Using API server storage');
    return new HttpBudgetClient();
  }
  return new DexieBudgetRepository(createDatabase());
}

function App() {
  const backend = useMemo(createBackend, []);
  const session = useMemo(
    () => new BudgetSession({ persistence: backend, purchases: backend }),
    [backend],
  );

  useEffect(() => () => session.dispose(), [session]);

  return <AppShell session={session} settingsStore={backend} />;
}

export default App;
