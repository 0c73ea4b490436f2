/**
 * ApplicationTable — One row per configured application
 *
 * Columns: Address, Stake (POKT), Service ID, Gateway. Only a window of
 * rows around the cursor is drawn when the terminal is short.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { DisplayRow, RowStatus } from '@stakewatch/shared';
import { windowStart } from '../core/view.js';

// ─── Layout ───────────────────────────────────────────────────────

interface Column {
    readonly title: string;
    readonly width: number;
    readonly cell: (row: DisplayRow) => string;
}

const COLUMNS: readonly Column[] = [
    { title: 'Address', width: 46, cell: (row) => row.address },
    { title: 'Stake (POKT)', width: 28, cell: (row) => row.stake },
    { title: 'Service ID', width: 16, cell: (row) => row.serviceId },
    { title: 'Gateway', width: 46, cell: (row) => row.gateway },
];

const STATUS_COLORS: Record<RowStatus, string> = {
    ok: 'white',
    error: 'red',
    parse_error: 'yellow',
};

// ─── Props ────────────────────────────────────────────────────────

export interface ApplicationTableProps {
    readonly rows: readonly DisplayRow[];
    readonly cursor: number;
    /** Maximum number of body rows to draw */
    readonly height: number;
    readonly emptyMessage: string;
}

// ─── Component ────────────────────────────────────────────────────

export function ApplicationTable({ rows, cursor, height, emptyMessage }: ApplicationTableProps): React.ReactElement {
    const start = windowStart(rows.length, cursor, height);
    const windowed = rows.slice(start, start + Math.max(1, height));

    return (
        <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
            <Box>
                {COLUMNS.map((column) => (
                    <Box key={column.title} width={column.width} marginRight={1}>
                        <Text bold color="cyan">{column.title}</Text>
                    </Box>
                ))}
            </Box>

            {rows.length === 0 && <Text dimColor color="gray">{emptyMessage}</Text>}

            {windowed.map((row, i) => {
                const selected = start + i === cursor;
                return (
                    <Box key={`${start + i}-${row.address}`}>
                        {COLUMNS.map((column) => (
                            <Box key={column.title} width={column.width} marginRight={1}>
                                <Text
                                    color={selected ? 'black' : STATUS_COLORS[row.status]}
                                    backgroundColor={selected ? 'cyan' : undefined}
                                    wrap="truncate-middle"
                                >
                                    {column.cell(row)}
                                </Text>
                            </Box>
                        ))}
                    </Box>
                );
            })}

            {rows.length > windowed.length && (
                <Text dimColor color="gray">
                    {start + 1}-{start + windowed.length} of {rows.length}
                </Text>
            )}
        </Box>
    );
}
