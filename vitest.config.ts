import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: { LOG_LEVEL: 'fatal' },
    testTimeout: 15000,
    hookTimeout: 15000,
  },
});
