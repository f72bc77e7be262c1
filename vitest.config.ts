import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/src/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      LOG_TO_FILE: 'false',
    },
  },
});
