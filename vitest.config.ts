import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
        testTimeout: 10000,
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json-summary'],
            include: ['src/**/*.ts'],
            exclude: ['src/index.ts', 'src/cli.ts', 'src/types.ts', 'src/**/*.test.ts'],
            thresholds: {
                lines: 85,
                branches: 75,
                functions: 85,
                statements: 85,
            },
        },
    },
});
