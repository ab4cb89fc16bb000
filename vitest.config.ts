import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    include: ['src/**/*.test.ts'],
    restoreMocks: true,
    testTimeout: 10000,
    env: { LOG_LEVEL: 'silent' },
  },
});
