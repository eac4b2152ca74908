import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'threads',

    watch: false
  }
});
