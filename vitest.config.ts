import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        'vitest.config.ts',
        'src/index.ts' // Entry point, exercised through buildServer
      ]
    },

    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    // Performance tests time real work
    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'threads',

    globals: true,
    watch: false
  }
});
