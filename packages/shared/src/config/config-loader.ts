/**
 * @stakewatch/shared — Config Loader
 *
 * Reads the YAML configuration once at startup. The document wraps
 * everything under a top-level `config:` key:
 *
 *   config:
 *     rpc_endpoint: https://node.example:443
 *     gateways: [pokt1gateway...]
 *     applications: [pokt1app..., pokt1app...]
 *
 * Any failure is a ConfigError; the dashboard cannot run without it.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
    CONFIG_PATH_ENV,
    DEFAULT_CLIENT_BINARY,
    DEFAULT_CONFIG_PATH,
    DEFAULT_QUERY_TIMEOUT_MS,
} from '../constants.js';

// ─── Types ────────────────────────────────────────────────────────

export interface DashboardConfig {
    readonly rpcEndpoint: string;
    readonly gateways: readonly string[];
    readonly applications: readonly string[];
    /** Executable used for chain queries */
    readonly clientBinary: string;
    readonly queryTimeoutMs: number;
}

export class ConfigError extends Error {
    constructor(
        readonly path: string,
        reason: string,
        options?: { cause?: unknown },
    ) {
        super(`Failed to load ${path}: ${reason}`, options);
        this.name = 'ConfigError';
    }
}

// ─── Schema ───────────────────────────────────────────────────────

const networkSchema = z.object({
    rpc_endpoint: z.string().trim().min(1, 'rpc_endpoint must not be empty'),
    gateways: z.array(z.string().trim().min(1)).min(1, 'at least one gateway is required'),
    applications: z.array(z.string().trim().min(1)).default([]),
    client_binary: z.string().trim().min(1).default(DEFAULT_CLIENT_BINARY),
    query_timeout_ms: z.number().int().positive().default(DEFAULT_QUERY_TIMEOUT_MS),
});

const documentSchema = z.object({
    config: networkSchema,
});

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            return `${where}: ${issue.message}`;
        })
        .join('; ');
}

// ─── Loader ───────────────────────────────────────────────────────

/**
 * Picks the config path: explicit argument, then STAKEWATCH_CONFIG,
 * then config.yaml in the working directory.
 */
export function resolveConfigPath(
    explicit?: string,
    env: NodeJS.ProcessEnv = process.env,
): string {
    const chosen = explicit || env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH;
    return resolve(chosen);
}

export function parseConfig(source: string, path = DEFAULT_CONFIG_PATH): DashboardConfig {
    let raw: unknown;
    try {
        raw = parseYaml(source);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(path, `invalid YAML (${reason})`, { cause: err });
    }

    if (typeof raw !== 'object' || raw === null || !('config' in raw)) {
        throw new ConfigError(path, 'missing top-level "config" key');
    }

    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(path, describeIssues(parsed.error), { cause: parsed.error });
    }

    const network = parsed.data.config;
    return Object.freeze({
        rpcEndpoint: network.rpc_endpoint,
        gateways: Object.freeze([...network.gateways]),
        applications: Object.freeze([...network.applications]),
        clientBinary: network.client_binary,
        queryTimeoutMs: network.query_timeout_ms,
    });
}

export function loadConfig(path = DEFAULT_CONFIG_PATH): DashboardConfig {
    let source: string;
    try {
        source = readFileSync(path, 'utf-8');
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(path, reason, { cause: err });
    }
    return parseConfig(source, path);
}
