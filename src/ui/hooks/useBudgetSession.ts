import { useEffect, useSyncExternalStore } from 'react';
import type { BudgetSession, SessionState } from '../../session/budgetSession';

export interface SessionBinding {
  subscribe: (onChange: () => void) => () => void;
  getSnapshot: () => SessionState;
}

const bindings = new WeakMap<BudgetSession, SessionBinding>();

/** One subscribe/snapshot pair per session, so renders never resubscribe */
export function sessionBinding(session: BudgetSession): SessionBinding {
  let binding = bindings.get(session);
  if (!binding) {
    binding = {
      subscribe: (onChange) => session.subscribe(onChange),
      getSnapshot: () => session.getState(),
    };
    bindings.set(session, binding);
  }
  return binding;
}

/** Subscribe a component to a session and load its year on mount */
export function useBudgetSession(session: BudgetSession): SessionState {
  const { subscribe, getSnapshot } = sessionBinding(session);
  const state = useSyncExternalStore(subscribe, getSnapshot);

  useEffect(() => {
    void session.load();
  }, [session]);

  return state;
}
