import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['packages/matrix-bridge/src/testing/setup.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
