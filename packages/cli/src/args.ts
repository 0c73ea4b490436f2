/**
 * @stakewatch/cli — Argument helpers
 *
 * Only one flag exists (`--config`), so a full parser would be overkill;
 * everything else is positional.
 */

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export interface ParsedArgs {
    readonly command: string | undefined;
    readonly positionals: readonly string[];
    /** Raw `--config` value; resolved later against env and cwd */
    readonly configPath: string | undefined;
}

/** Accepts `--config <path>`, `--config=<path>` and `-c <path>`. */
export function parseArgs(args: readonly string[]): ParsedArgs {
    const positionals: string[] = [];
    let configPath: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';

        if (arg.startsWith('--config=')) {
            configPath = arg.slice('--config='.length);
            if (!configPath) throw new UsageError('--config needs a path');
            continue;
        }

        if (arg === '--config' || arg === '-c') {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('-')) {
                throw new UsageError(`${arg} needs a path`);
            }
            configPath = value;
            i++;
            continue;
        }

        positionals.push(arg);
    }

    const [command, ...rest] = positionals;
    return { command, positionals: rest, configPath };
}
