import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['app/backend/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    env: {
      LOG_SILENT: 'true',
    },
  },
});
