import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        teardownTimeout: 1000,
        projects: [
            'server',
            'shared',
        ],
        coverage: {
            reportOnFailure: true,
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['server/src/**/*.ts', 'shared/**/*.ts'],
            exclude: ['**/*.test.ts', '**/vitest.config.ts'],
            reportsDirectory: './coverage',
        },
    },
});
