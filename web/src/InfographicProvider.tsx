import { useEffect, useState } from 'react';
import { decodeInfographicValue, encodeInfographic, type InfographicDocument } from '@repo-infographic/server/infographic';

import { runGenerationJob } from './api';
import { InfographicContext } from './infographicContext';
import { InfographicSession } from './session';

const STORAGE_KEY = 'repo-infographic:last-document';

function readFromSessionStorage(): InfographicDocument | null {
  try {
    if (typeof window === 'undefined') return null;
    const raw = window.sessionStorage.getItem(STORAGE_KEY);
    if (!raw) return null;
    const decoded = decodeInfographicValue(JSON.parse(raw) as unknown);
    return decoded.ok ? decoded.document : null;
  } catch {
    return null;
  }
}

function writeToSessionStorage(document: InfographicDocument | null): void {
  try {
    if (typeof window === 'undefined') return;
    if (!document) {
      window.sessionStorage.removeItem(STORAGE_KEY);
      return;
    }
    window.sessionStorage.setItem(STORAGE_KEY, JSON.stringify(encodeInfographic(document)));
  } catch (error) {
    console.warn(`[session] cannot persist document: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function InfographicProvider({ children }: { children: React.ReactNode }) {
  const [session] = useState(() => {
    const created = new InfographicSession(runGenerationJob);
    const restored = readFromSessionStorage();
    if (restored) created.load(restored);
    return created;
  });

  useEffect(() => {
    let last = session.currentDocument;
    return session.subscribe(() => {
      const next = session.currentDocument;
      if (next === last) return;
      last = next;
      writeToSessionStorage(next);
    });
  }, [session]);

  return <InfographicContext.Provider value={session}>{children}</InfographicContext.Provider>;
}
