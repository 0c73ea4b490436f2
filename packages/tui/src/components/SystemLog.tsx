/**
 * SystemLog — Compact system log panel
 *
 * Shows the most recent controller events (boot, refreshes, failed
 * queries, sort and filter changes).
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { LogEntry } from '../core/dashboard-controller.js';

// ─── Props ────────────────────────────────────────────────────────

export interface SystemLogProps {
    readonly logs: readonly LogEntry[];
    /** Number of recent entries to display */
    readonly displayCount?: number;
}

// ─── Component ────────────────────────────────────────────────────

export function SystemLog({ logs, displayCount = 5 }: SystemLogProps): React.ReactElement {
    const visible = logs.slice(-displayCount);

    return (
        <Box
            flexDirection="column"
            borderStyle="single"
            borderColor="gray"
            paddingX={1}
        >
            <Text bold color="gray" underline>System Log</Text>
            {visible.map((entry, i) => (
                <Text key={i} wrap="truncate-end">
                    <Text color="gray" dimColor>[{entry.time}] </Text>
                    <Text color={entry.color} dimColor>{entry.text}</Text>
                </Text>
            ))}
        </Box>
    );
}
