import { createContext, useContext, useSyncExternalStore } from 'react';

import type { InfographicSession, SessionSnapshot } from './session';

export const InfographicContext = createContext<InfographicSession | undefined>(undefined);

export function useInfographicSession(): { session: InfographicSession; snapshot: SessionSnapshot } {
  const session = useContext(InfographicContext);
  if (!session) throw new Error('useInfographicSession must be used within <InfographicProvider>');
  const snapshot = useSyncExternalStore(session.subscribe, session.getSnapshot);
  return { session, snapshot };
}
