import { createContext, useContext, type ReactNode } from 'react';
import type { DashService } from '../lib/dashService';

const DashContext = createContext<DashService | null>(null);

export function useDash(): DashService {
  const service = useContext(DashContext);
  if (!service) throw new Error('useDash() must be used inside <DashProvider>');
  return service;
}

export function DashProvider({ service, children }: { service: DashService; children: ReactNode }) {
  return <DashContext.Provider value={service}>{children}</DashContext.Provider>;
}
