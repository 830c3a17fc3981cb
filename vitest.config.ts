import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['test/**/*.test.ts'],
    testTimeout: 10000,
    // fetch is stubbed per test
    unstubGlobals: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
