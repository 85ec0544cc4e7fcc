import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    coverage: {
      reporter: ['text', 'json-summary', 'json'],
      thresholds: {
        lines: 85,
        branches: 85,
        functions: 85,
        statements: 85
      }
    }
  }
});
