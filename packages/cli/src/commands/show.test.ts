import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CommandFailedError } from '@stakewatch/shared';
import type { CommandRunner } from '@stakewatch/shared';
import { showCommand } from './show.js';

let tempDir = '';
let configPath = '';
let lines: string[] = [];

function plain(): string[] {
    // eslint-disable-next-line no-control-regex
    return lines.map((line) => line.replace(/\x1b\[[0-9;]*m/g, ''));
}

beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stakewatch-show-test-'));
    configPath = join(tempDir, 'config.yaml');
    writeFileSync(configPath, [
        'config:',
        '  rpc_endpoint: https://node.test',
        '  gateways: [gw-one]',
        '  client_binary: fake-client',
        '  query_timeout_ms: 500',
    ].join('\n'));
    lines = [];
    const capture = (...args: unknown[]): void => {
        lines.push(args.map(String).join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
});

afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
});

describe('showCommand', () => {
    it('prints the pretty-printed record', async () => {
        const run = vi.fn().mockResolvedValue({ stdout: '{"application":{"address":"app-a"}}', stderr: '' });
        const runner: CommandRunner = { run };

        expect(await showCommand({ configPath, address: 'app-a', runner })).toBe(0);
        expect(run).toHaveBeenCalledWith(
            'fake-client',
            ['query', 'application', 'show-application', 'app-a', '--node', 'https://node.test', '--output', 'json'],
            { timeoutMs: 500 },
        );
        expect(plain()).toEqual([
            '  🔎 Querying app-a on https://node.test...',
            '{\n  "application": {\n    "address": "app-a"\n  }\n}',
        ]);
    });

    it('exits 1 when the client fails', async () => {
        const runner: CommandRunner = {
            run: vi.fn().mockRejectedValue(new CommandFailedError('fake-client', 3, 'key not found')),
        };

        expect(await showCommand({ configPath, address: 'app-a', runner })).toBe(1);
        expect(plain()[1]).toBe('❌ Query failed: fake-client failed (exit 3): key not found');
    });

    it('exits 1 when the config cannot be loaded', async () => {
        const missing = join(tempDir, 'nope.yaml');
        const runner: CommandRunner = { run: vi.fn() };

        expect(await showCommand({ configPath: missing, address: 'app-a', runner })).toBe(1);
        expect(runner.run).not.toHaveBeenCalled();
        expect(plain()[0]?.startsWith(`❌ Failed to load ${missing}: `)).toBe(true);
    });
});
