import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration
 *
 * - Each package under packages/ is its own project
 * - No retries, so failures surface immediately
 * - Extended timeouts for property-based testing
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    projects: ['packages/*'],
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,
    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },
  },
});
