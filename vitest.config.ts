import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Model calls are mocked; this only guards against a hung promise
    testTimeout: 30000,

    // Starts the msw server that stands in for the search APIs
    setupFiles: ['./tests/setup.ts'],

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/main.ts', '**/*.d.ts'],
    },

    globals: true,
  },
});
