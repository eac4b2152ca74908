import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.performance.test.ts'],
    testTimeout: 30000,
    // One file at a time so timings do not overlap
    fileParallelism: false,
    reporters: ['verbose'],
    watch: false
  }
});
