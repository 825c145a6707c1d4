import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'site-content',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    testTimeout: 5_000,
    pool: 'forks',
  },
});
