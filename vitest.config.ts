import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
        testTimeout: 10_000,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json-summary'],
            include: ['src/**/*.ts'],
            exclude: ['src/index.ts', 'src/cli.ts', 'src/test-utils/**'],
            thresholds: {
                lines: 85,
                branches: 75,
                functions: 85,
                statements: 85,
            },
        },
    },
});
