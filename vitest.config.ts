import { defineConfig } from 'vitest/config';

/**
 * bytefill test configuration
 *
 * One run covers every workspace package plus the root acceptance specs.
 * Property-based tests use fast-check with fixed seeds so failures replay.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // ========================================================================
    // EXECUTION ENVIRONMENT
    // ========================================================================

    environment: 'node',
    pool: 'forks',

    // ========================================================================
    // TEST DISCOVERY AND EXECUTION
    // ========================================================================

    include: [
      'packages/*/src/**/*.test.ts',
      'test/**/*.test.ts',
      'test/**/*.spec.ts',
    ],
    setupFiles: ['./test/setup.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/__tests__/**', 'packages/*/src/index.ts'],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
