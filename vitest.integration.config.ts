import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'], // Needs DATABASE_URL pointing at PostgreSQL
    pool: 'forks',
    maxWorkers: 1, // Tests share one database
    maxConcurrency: 1,
    fileParallelism: false,
  },
});
