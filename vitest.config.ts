import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        // Workspace packages are loaded from source
        alias: [
            {
                find: /^@pacer\/core\/test-utils$/,
                replacement: fromRoot('./packages/core/src/logger/test-utils.ts'),
            },
            {
                find: /^@pacer\/(core|server|client-sdk|orchestration|agents)$/,
                replacement: fromRoot('./packages/$1/src/index.ts'),
            },
        ],
    },
    test: {
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
    },
});
