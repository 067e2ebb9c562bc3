import { defineConfig } from 'vitest/config';

/**
 * Workspace test entry point
 *
 * Each package under packages/ is a Vitest project with its own config;
 * `npm test` runs them all once.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,

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
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },
  },
});
