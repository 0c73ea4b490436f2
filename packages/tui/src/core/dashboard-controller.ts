/**
 * @stakewatch/tui — Dashboard Controller
 *
 * Owns everything the dashboard knows: the loaded config, the current
 * row set, the input mode and the system log. Components never mutate
 * state; they call actions here and re-render from `getSnapshot()`.
 *
 * Lifecycle:
 *   booting ──(one tick, splash painted)──▶ ready ⇄ command | search | help
 *   any ──(q / Ctrl+C)──▶ terminated
 */

import {
    EMPTY_CELL,
    loadConfig,
    pluralize,
    queryApplication,
} from '@stakewatch/shared';
import type { CommandRunner, DashboardConfig, DisplayRow } from '@stakewatch/shared';
import { toDisplayRow } from './row-mapper.js';
import { applyView, DEFAULT_VIEW, nextSortField, SORT_LABELS } from './view.js';
import type { ViewOptions } from './view.js';

// ─── Types ────────────────────────────────────────────────────────

export type DashboardState = 'booting' | 'ready' | 'command' | 'search' | 'help' | 'terminated';

export const QUIT_COMMAND = 'q';
export const MAX_LOG_ENTRIES = 15;

export interface LogEntry {
    readonly time: string;
    readonly text: string;
    readonly color: string;
}

export interface DashboardSnapshot {
    readonly state: DashboardState;
    readonly rpcEndpoint: string;
    readonly gateway: string;
    /** Last refreshed rows, in configured order */
    readonly rows: readonly DisplayRow[];
    /** Rows after filter and sort */
    readonly visibleRows: readonly DisplayRow[];
    readonly view: ViewOptions;
    readonly cursor: number;
    readonly refreshing: boolean;
    readonly lastRefreshAt: string | null;
    readonly logs: readonly LogEntry[];
    readonly exitCode: number | null;
}

export type BootTask = () => Promise<void>;

export interface DashboardControllerOptions {
    readonly configPath: string;
    /** Chain client capability; defaults to spawning the configured binary */
    readonly runner?: CommandRunner;
    /** Defers the first refresh; defaults to the next setImmediate tick */
    readonly schedule?: (task: BootTask) => void;
    readonly onExit?: (code: number) => void;
    readonly now?: () => Date;
}

function scheduleNextTick(task: BootTask): void {
    setImmediate(() => {
        void task();
    });
}

// ─── Controller ───────────────────────────────────────────────────

export class DashboardController {
    private config: DashboardConfig | null = null;
    private gateway = EMPTY_CELL;
    private state: DashboardState = 'booting';
    private rows: readonly DisplayRow[] = [];
    private view: ViewOptions = DEFAULT_VIEW;
    private cursor = 0;
    private logs: LogEntry[] = [];
    private lastRefreshAt: string | null = null;
    private exitCode: number | null = null;

    private inFlight: Promise<void> | null = null;
    private queued: Promise<void> | null = null;

    private readonly listeners = new Set<() => void>();
    private snapshot: DashboardSnapshot;

    constructor(private readonly options: DashboardControllerOptions) {
        this.snapshot = this.buildSnapshot();
    }

    // ── Store interface (useSyncExternalStore) ────────────────────

    readonly subscribe = (listener: () => void): (() => void) => {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    };

    readonly getSnapshot = (): DashboardSnapshot => this.snapshot;

    // ── Boot ──────────────────────────────────────────────────────

    /**
     * Loads the config and schedules the first refresh. A ConfigError
     * propagates to the caller before anything is queried.
     */
    boot(): void {
        if (this.config) {
            throw new Error('Dashboard already booted');
        }

        const config = loadConfig(this.options.configPath);
        this.config = config;
        this.gateway = config.gateways[0] ?? EMPTY_CELL;
        this.log(`Loaded ${pluralize(config.applications.length, 'application')} from ${this.options.configPath}`, 'green');
        this.log(`Node: ${config.rpcEndpoint}  Gateway: ${this.gateway}`, 'gray');
        this.emit();

        const schedule = this.options.schedule ?? scheduleNextTick;
        schedule(() => this.finishBoot());
    }

    /** Removes the splash and runs the initial refresh. Never rejects. */
    async finishBoot(): Promise<void> {
        if (this.state === 'booting') {
            this.state = 'ready';
            this.emit();
        }
        try {
            await this.refresh();
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            this.log(`Initial refresh failed: ${reason}`, 'red');
            this.emit();
        }
    }

    // ── Refresh ───────────────────────────────────────────────────

    /**
     * Re-queries every configured application. Triggers that arrive while
     * a refresh is running collapse into a single follow-up run; the
     * returned promise settles once a refresh started after the trigger
     * has replaced the rows.
     */
    refresh(): Promise<void> {
        if (!this.config) {
            return Promise.reject(new Error('Dashboard has not been booted'));
        }

        if (this.inFlight) {
            if (!this.queued) {
                this.log('Refresh already running; queued one more', 'gray');
                this.emit();
                this.queued = this.inFlight.then(() => {
                    this.queued = null;
                    return this.startRefresh();
                });
            }
            return this.queued;
        }

        return this.startRefresh();
    }

    /** Fire-and-forget refresh for key bindings; failures land in the log. */
    requestRefresh(): void {
        this.refresh().catch((err: unknown) => {
            const reason = err instanceof Error ? err.message : String(err);
            this.log(`Refresh failed: ${reason}`, 'red');
            this.emit();
        });
    }

    private startRefresh(): Promise<void> {
        const run = this.performRefresh().finally(() => {
            if (this.inFlight === run) {
                this.inFlight = null;
                this.emit();
            }
        });
        this.inFlight = run;
        this.emit();
        return run;
    }

    private async performRefresh(): Promise<void> {
        const config = this.config;
        if (!config) return;

        this.log(`Refreshing ${pluralize(config.applications.length, 'application')}...`, 'cyan');
        this.emit();

        const next: DisplayRow[] = [];
        for (const address of config.applications) {
            const result = await queryApplication(address, config.rpcEndpoint, {
                runner: this.options.runner,
                clientBinary: config.clientBinary,
                timeoutMs: config.queryTimeoutMs,
            });
            if (result.kind !== 'ok') {
                this.log(`${address}: ${result.kind}: ${result.message}`, 'red');
            }
            next.push(toDisplayRow(address, result, this.gateway));
        }

        // Swap the whole set at once so the table never shows a partial refresh
        this.rows = next;
        this.lastRefreshAt = this.timestamp();
        const failed = next.filter((row) => row.status !== 'ok').length;
        this.log(
            `Refreshed ${pluralize(next.length, 'row')}${failed > 0 ? ` (${failed} failed)` : ''}`,
            failed > 0 ? 'yellow' : 'green',
        );
        this.clampCursor();
        this.emit();
    }

    // ── Command line ──────────────────────────────────────────────

    openCommand(): void {
        this.transition('ready', 'command');
    }

    /** `q` quits; any other text, empty included, just closes the line. */
    submitCommand(text: string): void {
        if (this.state !== 'command') return;
        const command = text.trim();
        if (command === QUIT_COMMAND) {
            this.log('Quit requested', 'gray');
            this.terminate(0);
            return;
        }
        if (command) {
            this.log(`Ignored command: ${command}`, 'gray');
        }
        this.state = 'ready';
        this.emit();
    }

    /** Esc or focus loss without submitting */
    cancelCommand(): void {
        this.transition('command', 'ready');
    }

    // ── Search ────────────────────────────────────────────────────

    openSearch(): void {
        this.transition('ready', 'search');
    }

    submitSearch(text: string): void {
        if (this.state !== 'search') return;
        const filter = text.trim();
        this.view = { ...this.view, filter };
        this.cursor = 0;
        this.state = 'ready';
        this.log(filter ? `Filter: "${filter}"` : 'Filter cleared', 'cyan');
        this.emit();
    }

    cancelSearch(): void {
        this.transition('search', 'ready');
    }

    // ── Help ──────────────────────────────────────────────────────

    openHelp(): void {
        this.transition('ready', 'help');
    }

    closeHelp(): void {
        this.transition('help', 'ready');
    }

    // ── Sorting ───────────────────────────────────────────────────

    cycleSort(): void {
        if (this.state !== 'ready') return;
        const sortBy = nextSortField(this.view.sortBy);
        this.view = { ...this.view, sortBy, sortDesc: false };
        this.log(`Sort: ${SORT_LABELS[sortBy]}`, 'cyan');
        this.emit();
    }

    toggleSortDirection(): void {
        if (this.state !== 'ready') return;
        this.view = { ...this.view, sortDesc: !this.view.sortDesc };
        this.log(`Sort: ${SORT_LABELS[this.view.sortBy]} (${this.view.sortDesc ? 'desc' : 'asc'})`, 'cyan');
        this.emit();
    }

    // ── Cursor ────────────────────────────────────────────────────

    moveCursor(delta: number): void {
        this.cursor += delta;
        this.clampCursor();
        this.emit();
    }

    cursorToStart(): void {
        this.cursor = 0;
        this.emit();
    }

    cursorToEnd(): void {
        this.cursor = Number.MAX_SAFE_INTEGER;
        this.clampCursor();
        this.emit();
    }

    // ── Exit ──────────────────────────────────────────────────────

    quit(): void {
        this.terminate(0);
    }

    // ── Private ───────────────────────────────────────────────────

    private terminate(code: number): void {
        if (this.state === 'terminated') return;
        this.state = 'terminated';
        this.exitCode = code;
        this.emit();
        this.options.onExit?.(code);
    }

    private transition(from: DashboardState, to: DashboardState): void {
        if (this.state !== from) return;
        this.state = to;
        this.emit();
    }

    private clampCursor(): void {
        const count = applyView(this.rows, this.view).length;
        this.cursor = Math.max(0, Math.min(this.cursor, count - 1));
    }

    private timestamp(): string {
        return (this.options.now?.() ?? new Date()).toLocaleTimeString('en-US');
    }

    private log(text: string, color = 'white'): void {
        this.logs = [...this.logs.slice(-(MAX_LOG_ENTRIES - 1)), { time: this.timestamp(), text, color }];
    }

    private buildSnapshot(): DashboardSnapshot {
        return {
            state: this.state,
            rpcEndpoint: this.config?.rpcEndpoint ?? '',
            gateway: this.gateway,
            rows: this.rows,
            visibleRows: applyView(this.rows, this.view),
            view: this.view,
            cursor: this.cursor,
            refreshing: this.inFlight !== null,
            lastRefreshAt: this.lastRefreshAt,
            logs: this.logs,
            exitCode: this.exitCode,
        };
    }

    private emit(): void {
        this.snapshot = this.buildSnapshot();
        for (const listener of this.listeners) listener();
    }
}
