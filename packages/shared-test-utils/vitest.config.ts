import { defineConfig } from 'vitest/config';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@arcade-gym/core': resolve(__dirname, '../@arcade-gym/core/src/index.ts'),
      '@arcade-gym/envs': resolve(__dirname, '../@arcade-gym/envs/src/index.ts'),
    },
  },
  test: {
    name: '@arcade-gym/test-utils',
    root: __dirname,

    // Test file patterns
    include: ['src/**/*.test.ts', 'examples/**/*.test.ts'],

    // Global test settings
    globals: true,
    environment: 'node',
    testTimeout: 30000,
  },
});
