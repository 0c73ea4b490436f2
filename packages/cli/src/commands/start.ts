/**
 * @stakewatch/cli — Start Command
 *
 * Opens the dashboard in the foreground and waits until the user quits.
 *
 * Usage: stakewatch start [--config <path>]
 */

import pc from 'picocolors';
import { ConfigError } from '@stakewatch/shared';
import { runDashboard } from '@stakewatch/tui';

export interface StartOptions {
    readonly configPath: string;
}

export async function startCommand({ configPath }: StartOptions): Promise<number> {
    try {
        return await runDashboard({ configPath });
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(pc.red(`\n❌ ${err.message}`));
            console.log(pc.dim(`   Copy config.example.yaml to ${configPath} or pass --config <path>\n`));
            return 1;
        }
        throw err;
    }
}
