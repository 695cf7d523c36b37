import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration. Each package under packages/ is a project
 * with its own vitest.config.ts; only run-wide settings live here.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    projects: ['packages/*'],

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
        'packages/*/src/**/types.ts',
      ],
    },
  },
});
