import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'],
    // Shared database: one file at a time
    pool: 'forks',
    fileParallelism: false,
    maxConcurrency: 1,
  },
});
