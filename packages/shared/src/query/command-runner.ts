/**
 * @stakewatch/shared — Command Runner
 *
 * The only place that spawns the external chain client. Callers depend
 * on the `CommandRunner` interface so tests can swap in a fake.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

// ─── Types ────────────────────────────────────────────────────────

export interface CommandOutput {
    readonly stdout: string;
    readonly stderr: string;
}

export interface RunOptions {
    readonly timeoutMs?: number;
}

export interface CommandRunner {
    /** Resolves with the captured output; rejects with CommandFailedError */
    run(binary: string, args: readonly string[], options?: RunOptions): Promise<CommandOutput>;
}

export class CommandFailedError extends Error {
    constructor(
        readonly command: string,
        readonly exitCode: number | null,
        readonly stderr: string,
        options?: { cause?: unknown },
    ) {
        const detail = stderr.trim() || (options?.cause instanceof Error ? options.cause.message : 'unknown error');
        super(`${command} failed${exitCode !== null ? ` (exit ${exitCode})` : ''}: ${detail}`, options);
        this.name = 'CommandFailedError';
    }
}

// ─── Helpers ──────────────────────────────────────────────────────

function readField(err: unknown, key: string): unknown {
    if (typeof err !== 'object' || err === null) return undefined;
    return Reflect.get(err, key);
}

// ─── Default Runner ───────────────────────────────────────────────

/** Runs binaries with execFile (no shell), capturing stdout/stderr. */
export class ExecFileRunner implements CommandRunner {
    async run(binary: string, args: readonly string[], options: RunOptions = {}): Promise<CommandOutput> {
        try {
            const { stdout, stderr } = await execFileAsync(binary, [...args], {
                timeout: options.timeoutMs ?? 0,
                maxBuffer: 16 * 1024 * 1024,
                encoding: 'utf-8',
            });
            return { stdout, stderr };
        } catch (err) {
            const code = readField(err, 'code');
            const stderr = readField(err, 'stderr');
            throw new CommandFailedError(
                binary,
                typeof code === 'number' ? code : null,
                typeof stderr === 'string' ? stderr : '',
                { cause: err },
            );
        }
    }
}
