/**
 * @stakewatch/tui — Entry Point
 *
 * Boots the DashboardController, then mounts the Ink (React for
 * terminals) application with the Dashboard as the root component.
 */

import React from 'react';
import { render } from 'ink';
import type { CommandRunner } from '@stakewatch/shared';
import { DashboardController } from './core/dashboard-controller.js';
import { loadLogoLine, loadSplashArt } from './core/art.js';
import { Dashboard } from './components/Dashboard.js';

export interface RunDashboardOptions {
    readonly configPath: string;
    readonly runner?: CommandRunner;
}

/**
 * Runs the dashboard until the user quits and resolves with the exit
 * code. A ConfigError from boot rejects before anything is rendered.
 */
export async function runDashboard(options: RunDashboardOptions): Promise<number> {
    const controller = new DashboardController({
        configPath: options.configPath,
        runner: options.runner,
    });
    controller.boot();

    const instance = render(
        React.createElement(Dashboard, {
            controller,
            logoLine: loadLogoLine(),
            splashArt: loadSplashArt(),
        }),
        { exitOnCtrlC: false },
    );
    await instance.waitUntilExit();

    return controller.getSnapshot().exitCode ?? 0;
}
