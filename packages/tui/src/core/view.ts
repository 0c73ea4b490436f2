/**
 * @stakewatch/tui — Table View
 *
 * Presentation-only ordering and filtering. The refreshed row set keeps
 * configured order; these helpers derive what the table shows.
 */

import type { DisplayRow } from '@stakewatch/shared';

// ─── Types ────────────────────────────────────────────────────────

export type SortField = 'config' | 'address' | 'stake' | 'service';

export interface ViewOptions {
    readonly sortBy: SortField;
    readonly sortDesc: boolean;
    readonly filter: string;
}

export const SORT_FIELDS: readonly SortField[] = ['config', 'address', 'stake', 'service'];

export const SORT_LABELS: Record<SortField, string> = {
    config: 'config order',
    address: 'address',
    stake: 'stake',
    service: 'service',
};

export const DEFAULT_VIEW: ViewOptions = { sortBy: 'config', sortDesc: false, filter: '' };

// ─── Helpers ──────────────────────────────────────────────────────

export function nextSortField(current: SortField): SortField {
    const index = SORT_FIELDS.indexOf(current);
    return SORT_FIELDS[(index + 1) % SORT_FIELDS.length] ?? 'config';
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function compareStake(a: DisplayRow, b: DisplayRow): number {
    if (a.stakeAmount === null && b.stakeAmount === null) return 0;
    if (a.stakeAmount === null) return 1;
    if (b.stakeAmount === null) return -1;
    if (a.stakeAmount === b.stakeAmount) return 0;
    // Highest stake first
    return a.stakeAmount > b.stakeAmount ? -1 : 1;
}

export function matchesFilter(row: DisplayRow, filter: string): boolean {
    const needle = filter.trim().toLowerCase();
    if (!needle) return true;
    return row.address.toLowerCase().includes(needle) || row.serviceId.toLowerCase().includes(needle);
}

/**
 * Rows as the table should show them. Error rows always sink to the
 * bottom of a stake sort, whichever the direction.
 */
export function applyView(rows: readonly DisplayRow[], view: ViewOptions): DisplayRow[] {
    const visible = rows.filter((row) => matchesFilter(row, view.filter));
    if (view.sortBy === 'config') {
        return view.sortDesc ? visible.reverse() : visible;
    }

    const compare = comparatorFor(view.sortBy, view.sortDesc ? -1 : 1);
    return visible
        .map((row, index) => ({ row, index }))
        .sort((a, b) => compare(a.row, b.row) || a.index - b.index)
        .map(({ row }) => row);
}

function comparatorFor(field: Exclude<SortField, 'config'>, direction: 1 | -1): (a: DisplayRow, b: DisplayRow) => number {
    switch (field) {
        case 'address':
            return (a, b) => direction * compareText(a.address, b.address);
        case 'service':
            return (a, b) => direction * compareText(a.serviceId, b.serviceId);
        case 'stake':
            return (a, b) => {
                const bothPresent = a.stakeAmount !== null && b.stakeAmount !== null;
                return (bothPresent ? direction : 1) * compareStake(a, b);
            };
    }
}

/**
 * First index of a `size`-row window over `count` rows that keeps the
 * cursor on screen, roughly centred.
 */
export function windowStart(count: number, cursor: number, size: number): number {
    if (size <= 0 || count <= size) return 0;
    const centred = cursor - Math.floor(size / 2);
    return Math.max(0, Math.min(centred, count - size));
}
