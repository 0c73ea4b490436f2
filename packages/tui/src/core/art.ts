/**
 * @stakewatch/tui — ASCII art
 *
 * Splash and logo live in packages/tui/art so they can be edited without
 * touching code. Missing files fall back to plain text.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { APP_NAME } from '@stakewatch/shared';

const ART_DIR = new URL('../../art/', import.meta.url);

function readArt(name: string, dir: URL): string | null {
    try {
        return readFileSync(fileURLToPath(new URL(name, dir)), 'utf-8');
    } catch {
        return null;
    }
}

export function loadSplashArt(dir: URL = ART_DIR): string {
    const art = readArt('splash.txt', dir);
    return art && art.trim() ? art.replace(/\s+$/, '') : `${APP_NAME}\nLoading...`;
}

/** First line of logo.txt */
export function loadLogoLine(dir: URL = ART_DIR): string {
    const art = readArt('logo.txt', dir);
    const first = art?.split('\n')[0]?.trim();
    return first ? first : APP_NAME;
}
