import { useSyncExternalStore } from 'react';
import type { MonitoringSession, SessionState } from '../session/monitoringSession';

/**
 * Subscribes to a MonitoringSession and re-renders on every state change.
 */
export function useMonitoringSession(session: MonitoringSession): SessionState {
    return useSyncExternalStore(session.subscribe, session.getSnapshot);
}
