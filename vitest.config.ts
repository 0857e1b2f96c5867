import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the workspace.
 *
 * Runs the colocated tests of every app and package with `npm test`.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test'
        }
    }
});
