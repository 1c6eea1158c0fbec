import { defineConfig } from 'vitest/config';

// Wall-clock assertions in the scheduler tests are written against UTC.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      TZ: 'UTC',
    },
    restoreMocks: true,
  },
});
