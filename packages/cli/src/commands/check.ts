/**
 * @stakewatch/cli — Check Command
 *
 * Loads the config the dashboard would use and prints what it found.
 *
 * Usage: stakewatch check [--config <path>]
 */

import pc from 'picocolors';
import { ConfigError, loadConfig, pluralize } from '@stakewatch/shared';
import type { DashboardConfig } from '@stakewatch/shared';

export interface CheckOptions {
    readonly configPath: string;
}

export async function checkCommand({ configPath }: CheckOptions): Promise<number> {
    let config: DashboardConfig;
    try {
        config = loadConfig(configPath);
    } catch (err) {
        if (err instanceof ConfigError) {
            console.error(pc.red(`❌ ${err.message}`));
            return 1;
        }
        throw err;
    }

    console.log(pc.green(`✅ ${configPath} is valid`));
    console.log(`   ${pc.dim('Node:')}      ${config.rpcEndpoint}`);
    console.log(`   ${pc.dim('Gateway:')}   ${config.gateways[0] ?? '-'}`);
    if (config.gateways.length > 1) {
        console.log(pc.yellow(`   ⚠️  ${config.gateways.length - 1} extra gateway(s) ignored; only the first is shown`));
    }
    console.log(`   ${pc.dim('Client:')}    ${config.clientBinary} (timeout ${config.queryTimeoutMs} ms)`);
    console.log(`   ${pc.dim('Tracking:')}  ${pluralize(config.applications.length, 'application')}`);
    for (const address of config.applications) {
        console.log(pc.dim(`     • ${address}`));
    }
    return 0;
}
