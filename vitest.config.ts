import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // In-process only: Express apps via supertest, in-memory store.
    // PostgreSQL suites are *.int.test.ts (see vitest.integration.config.ts).
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules/**', '**/*.int.{test,spec}.ts'],
    clearMocks: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
    },
  },
});
