import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment configuration
    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'vitest.performance.config.ts',
        'src/index.ts' // Re-exports only
      ]
    },

    // Test file patterns; timing tests run separately
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**', 'src/**/*.performance.test.ts'],

    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'threads',

    watch: false
  }
});
