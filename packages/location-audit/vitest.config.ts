import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'location-audit',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        environment: 'node',
        testTimeout: 30000,
        pool: 'forks',
        globals: true,
    },
});
