import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
    globals: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
