import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./test/setup.ts'],
    env: {
      TEST_SEED: process.env.TEST_SEED ?? '424242',
      FC_NUM_RUNS:
        process.env.FC_NUM_RUNS ?? (process.env.CI === 'true' ? '1000' : '100'),
    },
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/test-utils/**'],
    },
    // Property tests over 80-bit operands
    testTimeout: 10000,
  },
});
