/**
 * @stakewatch/tui — Dashboard (Slim Orchestrator)
 *
 * Thin layout shell that composes modular sub-components:
 *   HeaderBar        — key hints, node, gateway, refresh status
 *   Splash           — placeholder until the first refresh is scheduled
 *   ApplicationTable — one row per configured application
 *   HelpPanel        — key reference (help state)
 *   CommandLine      — `:` command and `/` search prompt
 *   SystemLog        — compact controller event log
 *
 * All state lives in the DashboardController; this component only maps
 * keys to controller actions and renders its snapshot.
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput, useStdout } from 'ink';
import { APP_NAME, APP_VERSION } from '@stakewatch/shared';
import type { DashboardController } from '../core/dashboard-controller.js';
import { useDashboard } from '../hooks/use-dashboard.js';
import { HeaderBar } from './HeaderBar.js';
import { Splash } from './Splash.js';
import { ApplicationTable } from './ApplicationTable.js';
import { HelpPanel } from './HelpPanel.js';
import { CommandLine } from './CommandLine.js';
import { SystemLog } from './SystemLog.js';

// Header, log, prompt and footer rows around the table body
const CHROME_HEIGHT = 20;
const MIN_TABLE_HEIGHT = 3;
const FALLBACK_TERMINAL_ROWS = 24;

// ─── Props ────────────────────────────────────────────────────────

export interface DashboardProps {
    readonly controller: DashboardController;
    readonly logoLine: string;
    readonly splashArt: string;
}

// ─── Component ────────────────────────────────────────────────────

export function Dashboard({ controller, logoLine, splashArt }: DashboardProps): React.ReactElement {
    const snapshot = useDashboard(controller);
    const { exit } = useApp();
    const { stdout } = useStdout();
    const [inputValue, setInputValue] = useState('');

    useEffect(() => {
        if (snapshot.state === 'terminated') {
            exit();
        }
    }, [snapshot.state, exit]);

    useInput((input, key) => {
        if (key.ctrl && input === 'c') {
            controller.quit();
            return;
        }

        switch (snapshot.state) {
            case 'command':
                if (key.escape) controller.cancelCommand();
                return;

            case 'search':
                if (key.escape) controller.cancelSearch();
                return;

            case 'help':
                if (key.escape || input === 'h' || input === '?' || input === 'q') controller.closeHelp();
                return;

            case 'ready':
                break;

            case 'booting':
            case 'terminated':
                return;
        }

        if (key.upArrow || input === 'k') {
            controller.moveCursor(-1);
            return;
        }
        if (key.downArrow || input === 'j') {
            controller.moveCursor(1);
            return;
        }

        switch (input) {
            case 'r':
                controller.requestRefresh();
                break;
            case ':':
                setInputValue('');
                controller.openCommand();
                break;
            case '/':
                setInputValue(snapshot.view.filter);
                controller.openSearch();
                break;
            case 's':
                controller.cycleSort();
                break;
            case 'S':
                controller.toggleSortDirection();
                break;
            case 'h':
            case '?':
                controller.openHelp();
                break;
            case 'g':
                controller.cursorToStart();
                break;
            case 'G':
                controller.cursorToEnd();
                break;
        }
    });

    const terminalRows = stdout.rows || FALLBACK_TERMINAL_ROWS;
    const tableHeight = Math.max(MIN_TABLE_HEIGHT, terminalRows - CHROME_HEIGHT);
    const emptyMessage = snapshot.rows.length === 0
        ? (snapshot.refreshing ? 'Querying applications...' : 'No applications configured')
        : `No rows match "${snapshot.view.filter}"`;

    return (
        <Box flexDirection="column" width="100%">
            <HeaderBar
                logoLine={logoLine}
                rpcEndpoint={snapshot.rpcEndpoint}
                gateway={snapshot.gateway}
                refreshing={snapshot.refreshing}
                lastRefreshAt={snapshot.lastRefreshAt}
                view={snapshot.view}
                rowCount={snapshot.rows.length}
                visibleCount={snapshot.visibleRows.length}
            />

            {snapshot.state === 'booting' ? (
                <Splash art={splashArt} />
            ) : snapshot.state === 'help' ? (
                <HelpPanel />
            ) : (
                <ApplicationTable
                    rows={snapshot.visibleRows}
                    cursor={snapshot.cursor}
                    height={tableHeight}
                    emptyMessage={emptyMessage}
                />
            )}

            {(snapshot.state === 'command' || snapshot.state === 'search') && (
                <CommandLine
                    mode={snapshot.state}
                    value={inputValue}
                    onChange={setInputValue}
                    onSubmit={(value) => {
                        if (snapshot.state === 'command') {
                            controller.submitCommand(value);
                        } else {
                            controller.submitSearch(value);
                        }
                    }}
                />
            )}

            <SystemLog logs={snapshot.logs} />

            <Box justifyContent="space-between" paddingX={1}>
                <Text dimColor color="gray">{APP_NAME} v{APP_VERSION}</Text>
                <Text dimColor color="gray">r refresh · : command · h help · Ctrl+C quit</Text>
            </Box>
        </Box>
    );
}
