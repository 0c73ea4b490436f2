export { runDashboard } from './main.js';
export type { RunDashboardOptions } from './main.js';
export { DashboardController, QUIT_COMMAND, MAX_LOG_ENTRIES } from './core/dashboard-controller.js';
export type {
    DashboardControllerOptions,
    DashboardSnapshot,
    DashboardState,
    LogEntry,
} from './core/dashboard-controller.js';
