import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['patrol-client/src/**/__tests__/**/*.test.ts', 'server/__tests__/**/*.test.ts', 'shared/__tests__/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
});
