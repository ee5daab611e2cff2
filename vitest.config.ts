import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    // tree-sitter is a native addon; keep each test file in its own process
    pool: 'forks',
    testTimeout: 20000,
  },
});
