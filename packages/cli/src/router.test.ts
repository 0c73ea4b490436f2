/**
 * Tests for the command router. The dashboard itself is never started
 * here; only commands that return without a terminal UI are exercised.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { main } from './router.js';

let tempDir = '';
let output: string[] = [];

function printed(): string {
    // eslint-disable-next-line no-control-regex
    return output.join('\n').replace(/\x1b\[[0-9;]*m/g, '');
}

beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stakewatch-cli-test-'));
    output = [];
    const capture = (...args: unknown[]): void => {
        output.push(args.map(String).join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
});

afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
});

describe('main', () => {
    it('prints the version', async () => {
        expect(await main(['version'])).toBe(0);
        expect(printed()).toBe('stakewatch v0.1.0');
    });

    it('shows help', async () => {
        expect(await main(['help'])).toBe(0);
        expect(printed()).toContain('Validates the config file and prints a summary');
    });

    it('exits 1 on an unknown command', async () => {
        expect(await main(['restake'])).toBe(1);
        expect(printed()).toContain('❌ Unknown command: restake');
    });

    it('exits 1 when show has no address', async () => {
        expect(await main(['show'])).toBe(1);
        expect(printed()).toContain('Missing argument: show <address>');
    });

    it('exits 1 on a dangling --config flag', async () => {
        expect(await main(['check', '--config'])).toBe(1);
        expect(printed()).toContain('--config needs a path');
    });

    it('routes check to the config named by the environment', async () => {
        const path = join(tempDir, 'env.yaml');
        writeFileSync(path, 'config:\n  rpc_endpoint: https://node.test\n  gateways: [gw-one]\n  applications: [app-a]\n');

        expect(await main(['check'], { STAKEWATCH_CONFIG: path })).toBe(0);
        expect(printed()).toContain(`✅ ${path} is valid`);
    });

    it('prefers --config over the environment', async () => {
        const missing = join(tempDir, 'missing.yaml');
        expect(await main(['check', '--config', missing], { STAKEWATCH_CONFIG: join(tempDir, 'other.yaml') })).toBe(1);
        expect(printed()).toContain(`Failed to load ${missing}`);
    });
});
