/**
 * Tests for the Config Loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError, loadConfig, parseConfig, resolveConfigPath } from './config-loader.js';

let tempDir = '';

function writeConfig(content: string): string {
    const path = join(tempDir, 'config.yaml');
    writeFileSync(path, content, 'utf-8');
    return path;
}

beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'stakewatch-config-test-'));
});

afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
    it('returns the nested config block with defaults applied', () => {
        const path = writeConfig([
            'config:',
            '  rpc_endpoint: https://node.test:443',
            '  gateways:',
            '    - gw-one',
            '    - gw-two',
            '  applications:',
            '    - app-a',
            '    - app-b',
        ].join('\n'));

        const config = loadConfig(path);
        expect(config).toEqual({
            rpcEndpoint: 'https://node.test:443',
            gateways: ['gw-one', 'gw-two'],
            applications: ['app-a', 'app-b'],
            clientBinary: 'pocketd',
            queryTimeoutMs: 30_000,
        });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('honours client_binary and query_timeout_ms overrides', () => {
        const path = writeConfig([
            'config:',
            '  rpc_endpoint: http://localhost:26657',
            '  gateways: [gw]',
            '  applications: []',
            '  client_binary: /opt/bin/pocketd',
            '  query_timeout_ms: 5000',
        ].join('\n'));

        const config = loadConfig(path);
        expect(config.clientBinary).toBe('/opt/bin/pocketd');
        expect(config.queryTimeoutMs).toBe(5000);
        expect(config.applications).toEqual([]);
    });

    it('throws ConfigError when the file does not exist', () => {
        const missing = join(tempDir, 'nope.yaml');
        expect(() => loadConfig(missing)).toThrow(ConfigError);
    });

    it('throws ConfigError on invalid YAML', () => {
        const path = writeConfig('config: [unclosed');
        expect(() => loadConfig(path)).toThrow(/invalid YAML/);
    });

    it('throws ConfigError when the wrapper key is missing', () => {
        const path = writeConfig('rpc_endpoint: http://x\ngateways: [gw]\n');
        expect(() => loadConfig(path)).toThrow('missing top-level "config" key');
    });

    it('throws ConfigError when no gateway is configured', () => {
        const path = writeConfig('config:\n  rpc_endpoint: http://x\n  gateways: []\n  applications: [a]\n');
        expect(() => loadConfig(path)).toThrow('config.gateways: at least one gateway is required');
    });

    it('carries the path on the error', () => {
        const path = writeConfig('');
        let caught: unknown;
        try {
            loadConfig(path);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ConfigError);
        expect(caught instanceof ConfigError && caught.path).toBe(path);
    });
});

describe('parseConfig', () => {
    it('rejects a blank rpc endpoint', () => {
        expect(() => parseConfig('config:\n  rpc_endpoint: "  "\n  gateways: [gw]\n'))
            .toThrow('config.rpc_endpoint: rpc_endpoint must not be empty');
    });

    it('defaults applications to an empty list', () => {
        const config = parseConfig('config:\n  rpc_endpoint: http://x\n  gateways: [gw]\n');
        expect(config.applications).toEqual([]);
    });
});

describe('resolveConfigPath', () => {
    it('prefers the explicit path', () => {
        expect(resolveConfigPath('custom.yaml', { STAKEWATCH_CONFIG: 'env.yaml' })).toBe(resolve('custom.yaml'));
    });

    it('falls back to STAKEWATCH_CONFIG', () => {
        expect(resolveConfigPath(undefined, { STAKEWATCH_CONFIG: 'env.yaml' })).toBe(resolve('env.yaml'));
    });

    it('defaults to config.yaml', () => {
        expect(resolveConfigPath(undefined, {})).toBe(resolve('config.yaml'));
    });
});
