import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        // Workspace packages resolve to their TypeScript sources
        conditions: ['development'],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            // CLI entry point only wires argv to processMonth
            exclude: ['packages/cli/src/index.ts'],
        },
    },
});
