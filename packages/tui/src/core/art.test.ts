import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadLogoLine, loadSplashArt } from './art.js';

describe('art loading', () => {
    let dir: string;
    let dirUrl: URL;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'stakewatch-art-'));
        dirUrl = pathToFileURL(`${dir}/`);
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('reads the bundled logo', () => {
        expect(loadLogoLine()).toBe('[ s t a k e w a t c h ]');
    });

    it('trims trailing whitespace from the splash', () => {
        writeFileSync(join(dir, 'splash.txt'), '  banner\nline two\n\n\n');
        expect(loadSplashArt(dirUrl)).toBe('  banner\nline two');
    });

    it('falls back when files are missing', () => {
        expect(loadSplashArt(dirUrl)).toBe('stakewatch\nLoading...');
        expect(loadLogoLine(dirUrl)).toBe('stakewatch');
    });

    it('falls back on a blank logo', () => {
        writeFileSync(join(dir, 'logo.txt'), '   \nsecond');
        expect(loadLogoLine(dirUrl)).toBe('stakewatch');
    });
});
