import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: false,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
