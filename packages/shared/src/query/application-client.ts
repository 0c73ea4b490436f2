/**
 * @stakewatch/shared — Application Query Client
 *
 * Looks up one application through the chain client:
 *
 *   pocketd query application show-application <address> --node <rpc> --output json
 *
 * and classifies the outcome instead of throwing. One attempt per call.
 */

import { z } from 'zod';
import { DEFAULT_CLIENT_BINARY, DEFAULT_QUERY_TIMEOUT_MS } from '../constants.js';
import type { QueryResult } from '../types/application.js';
import { ExecFileRunner } from './command-runner.js';
import type { CommandRunner } from './command-runner.js';

// ─── Types ────────────────────────────────────────────────────────

export interface QueryOptions {
    readonly runner?: CommandRunner;
    readonly clientBinary?: string;
    readonly timeoutMs?: number;
}

type RawOutcome =
    | { readonly ok: true; readonly stdout: string }
    | { readonly ok: false; readonly message: string };

// ─── Schema ───────────────────────────────────────────────────────

const applicationSchema = z.object({
    stake: z.object({
        amount: z.string().regex(/^\d+$/, 'must be a non-negative integer string'),
    }),
    service_configs: z.array(z.object({
        service_id: z.string(),
    })),
});

const defaultRunner = new ExecFileRunner();

// ─── Helpers ──────────────────────────────────────────────────────

export function buildShowApplicationArgs(address: string, rpcEndpoint: string): string[] {
    return ['query', 'application', 'show-application', address, '--node', rpcEndpoint, '--output', 'json'];
}

async function invoke(address: string, rpcEndpoint: string, options: QueryOptions): Promise<RawOutcome> {
    const runner = options.runner ?? defaultRunner;
    const binary = options.clientBinary ?? DEFAULT_CLIENT_BINARY;
    try {
        const { stdout } = await runner.run(binary, buildShowApplicationArgs(address, rpcEndpoint), {
            timeoutMs: options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS,
        });
        return { ok: true, stdout };
    } catch (err) {
        return { ok: false, message: err instanceof Error ? err.message : String(err) };
    }
}

function describeFieldIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) return 'unexpected application shape';
    const where = issue.path.length > 0 ? issue.path.join('.') : 'application';
    return `${where}: ${issue.message}`;
}

/**
 * Classifies raw client output. Exported so the mapping can be checked
 * without a runner.
 */
export function parseApplicationOutput(address: string, stdout: string): QueryResult {
    let payload: unknown;
    try {
        payload = JSON.parse(stdout);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return { kind: 'parse_failed', message: `invalid JSON: ${reason}` };
    }

    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
        return { kind: 'parse_failed', message: 'expected a JSON object' };
    }
    if ('error' in payload) {
        return { kind: 'parse_failed', message: `node returned an error: ${JSON.stringify(payload.error)}` };
    }
    if (!('application' in payload) || typeof payload.application !== 'object' || payload.application === null) {
        return { kind: 'parse_failed', message: 'missing "application" object' };
    }

    const fields = applicationSchema.safeParse(payload.application);
    if (!fields.success) {
        return { kind: 'field_missing', message: describeFieldIssue(fields.error) };
    }

    return {
        kind: 'ok',
        record: {
            address,
            stakeAmount: BigInt(fields.data.stake.amount),
            serviceConfigs: fields.data.service_configs.map((c) => ({ serviceId: c.service_id })),
        },
    };
}

// ─── Public API ───────────────────────────────────────────────────

export async function queryApplication(
    address: string,
    rpcEndpoint: string,
    options: QueryOptions = {},
): Promise<QueryResult> {
    const outcome = await invoke(address, rpcEndpoint, options);
    if (!outcome.ok) {
        return { kind: 'invocation_failed', message: outcome.message };
    }
    return parseApplicationOutput(address, outcome.stdout);
}

/**
 * Raw record for a details view, pretty-printed. Throws on invocation
 * failure; non-JSON output is returned unchanged.
 */
export async function showApplication(
    address: string,
    rpcEndpoint: string,
    options: QueryOptions = {},
): Promise<string> {
    const outcome = await invoke(address, rpcEndpoint, options);
    if (!outcome.ok) {
        throw new Error(outcome.message);
    }
    try {
        return JSON.stringify(JSON.parse(outcome.stdout), null, 2);
    } catch {
        return outcome.stdout;
    }
}
