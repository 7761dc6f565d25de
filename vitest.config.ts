import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/backend/tests/**/*.test.ts'],
    setupFiles: ['apps/backend/tests/setup.ts'],
    testTimeout: 15_000
  }
});
