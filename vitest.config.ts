import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Project mode for the monorepo: each package owns its config
    projects: [
      'packages/@arcade-gym/*/vitest.config.ts',
      'packages/shared-test-utils/vitest.config.ts',
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        lines: 70,
        functions: 70,
        statements: 70,
        branches: 60,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.config.{ts,js}',
        '**/*.d.ts',
        '**/__tests__/**',
        'benchmark/**',
        'examples/**',
      ],
    },
  },
});
