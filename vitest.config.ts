import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageEntry = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@stakewatch/shared': packageEntry('./packages/shared/src/index.ts'),
            '@stakewatch/tui': packageEntry('./packages/tui/src/index.ts'),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        exclude: ['dist/**', 'node_modules/**'],
    },
});
