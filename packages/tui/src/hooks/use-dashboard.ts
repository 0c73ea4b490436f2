import { useSyncExternalStore } from 'react';
import type { DashboardController, DashboardSnapshot } from '../core/dashboard-controller.js';

/** Re-renders whenever the controller publishes a new snapshot */
export function useDashboard(controller: DashboardController): DashboardSnapshot {
    return useSyncExternalStore(controller.subscribe, controller.getSnapshot);
}
