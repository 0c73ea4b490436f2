/**
 * HeaderBar — key hints, node/gateway and refresh status
 *
 * Left: available keys. Right: logo line. Second row shows where the
 * data comes from and when it was last refreshed.
 */

import React from 'react';
import { Box, Text } from 'ink';
import { SORT_LABELS } from '../core/view.js';
import type { ViewOptions } from '../core/view.js';

// ─── Props ────────────────────────────────────────────────────────

export interface HeaderBarProps {
    readonly logoLine: string;
    readonly rpcEndpoint: string;
    readonly gateway: string;
    readonly refreshing: boolean;
    readonly lastRefreshAt: string | null;
    readonly view: ViewOptions;
    readonly rowCount: number;
    readonly visibleCount: number;
}

const KEY_HINTS: ReadonlyArray<[string, string]> = [
    ['r', 'Refresh'],
    [':', 'Command'],
    ['/', 'Search'],
    ['s', 'Sort'],
    ['h', 'Help'],
];

// ─── Component ────────────────────────────────────────────────────

export function HeaderBar(props: HeaderBarProps): React.ReactElement {
    const { logoLine, rpcEndpoint, gateway, refreshing, lastRefreshAt, view, rowCount, visibleCount } = props;

    return (
        <Box flexDirection="column" borderStyle="double" borderColor="green" paddingX={1}>
            <Box justifyContent="space-between">
                <Box gap={2}>
                    {KEY_HINTS.map(([key, label]) => (
                        <Text key={key}>
                            <Text color="yellow" bold>{key}</Text>
                            <Text color="gray">:{label}</Text>
                        </Text>
                    ))}
                </Box>
                <Text bold color="green">{logoLine}</Text>
            </Box>

            <Box justifyContent="space-between">
                <Box gap={2}>
                    <Text color="cyan">⛓ {rpcEndpoint || '-'}</Text>
                    <Text color="magenta">🧱 {gateway}</Text>
                </Box>
                <Box gap={2}>
                    {view.filter && (
                        <Text color="yellow">🔍 "{view.filter}" {visibleCount}/{rowCount}</Text>
                    )}
                    <Text color="gray">
                        ⇅ {SORT_LABELS[view.sortBy]} {view.sortDesc ? '↓' : '↑'}
                    </Text>
                    {refreshing ? (
                        <Text color="yellow" bold>⟳ Refreshing...</Text>
                    ) : (
                        <Text color="gray">{lastRefreshAt ? `Updated ${lastRefreshAt}` : 'Not refreshed yet'}</Text>
                    )}
                </Box>
            </Box>
        </Box>
    );
}
