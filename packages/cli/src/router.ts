/**
 * @stakewatch/cli — Command Router
 *
 * Parses CLI arguments and routes to the appropriate command handler.
 * Every handler resolves with the process exit code.
 *
 * Usage:
 *   stakewatch [start]        — Open the dashboard
 *   stakewatch check          — Validate the config file
 *   stakewatch show <address> — Print one application record
 */

import pc from 'picocolors';
import { APP_NAME, APP_VERSION, CONFIG_PATH_ENV, resolveConfigPath } from '@stakewatch/shared';
import { parseArgs, UsageError } from './args.js';
import type { ParsedArgs } from './args.js';

export function showHelp(): void {
    console.log(`
${pc.bold(pc.cyan(`⛓ ${APP_NAME}`))} ${pc.dim(`v${APP_VERSION}`)}
${pc.dim('Terminal dashboard for on-chain application stakes')}

${pc.bold('Usage:')}
  ${pc.cyan(APP_NAME)} ${pc.yellow('[command]')} ${pc.dim('[--config <path>]')}

${pc.bold('Commands:')}
  ${pc.yellow('start')}            Opens the dashboard (default)
  ${pc.yellow('check')}            Validates the config file and prints a summary
  ${pc.yellow('show')} ${pc.dim('<address>')}   Prints the raw record of one application
  ${pc.yellow('version')}          Prints the version
  ${pc.yellow('help')}             Shows this message

${pc.bold('Config:')}
  ${pc.dim('--config <path>, then')} ${pc.cyan(CONFIG_PATH_ENV)}${pc.dim(', then ./config.yaml')}
  `);
}

export async function main(args: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    let parsed: ParsedArgs;
    try {
        parsed = parseArgs(args);
    } catch (err) {
        if (err instanceof UsageError) {
            console.log(pc.red(`\n❌ ${err.message}`));
            return 1;
        }
        throw err;
    }

    const configPath = resolveConfigPath(parsed.configPath, env);

    switch (parsed.command) {
        case 'start':
        case undefined: {
            const { startCommand } = await import('./commands/start.js');
            return startCommand({ configPath });
        }

        case 'check': {
            const { checkCommand } = await import('./commands/check.js');
            return checkCommand({ configPath });
        }

        case 'show': {
            const address = parsed.positionals[0];
            if (!address) {
                console.log(pc.red('\n❌ Missing argument: show <address>'));
                return 1;
            }
            const { showCommand } = await import('./commands/show.js');
            return showCommand({ configPath, address });
        }

        case 'version':
        case '--version':
        case '-v': {
            console.log(`${APP_NAME} v${APP_VERSION}`);
            return 0;
        }

        case 'help':
        case '--help':
        case '-h': {
            showHelp();
            return 0;
        }

        default: {
            console.log(pc.red(`\n❌ Unknown command: ${parsed.command}`));
            showHelp();
            return 1;
        }
    }
}
