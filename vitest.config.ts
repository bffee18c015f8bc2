import { defineConfig } from 'vitest/config';

/**
 * Shapecheck test configuration
 *
 * - One run covers every workspace package
 * - Fixed execution order and no retries so failures surface immediately
 * - Longer timeouts for fast-check property tests
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // Test files pattern - includes all packages in the monorepo
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
    },
  },
});
