import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Several suites mutate process.env; keep files sequential.
    fileParallelism: false,
  },
});
