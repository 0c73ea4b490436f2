/**
 * @stakewatch/cli — Show Command
 *
 * Queries one application with the configured node and prints the raw
 * record.
 *
 * Usage: stakewatch show <address> [--config <path>]
 */

import pc from 'picocolors';
import { ConfigError, loadConfig, showApplication } from '@stakewatch/shared';
import type { CommandRunner } from '@stakewatch/shared';

export interface ShowOptions {
    readonly configPath: string;
    readonly address: string;
    readonly runner?: CommandRunner;
}

export async function showCommand({ configPath, address, runner }: ShowOptions): Promise<number> {
    try {
        const config = loadConfig(configPath);
        console.log(pc.dim(`  🔎 Querying ${address} on ${config.rpcEndpoint}...`));
        const output = await showApplication(address, config.rpcEndpoint, {
            runner,
            clientBinary: config.clientBinary,
            timeoutMs: config.queryTimeoutMs,
        });
        console.log(output);
        return 0;
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(pc.red(`❌ ${err.message}`));
            return 1;
        }
        if (err instanceof Error) {
            console.error(pc.red(`❌ Query failed: ${err.message}`));
            return 1;
        }
        throw err;
    }
}
