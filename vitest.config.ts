import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['lib/src/**/*.ts', 'api/**/*.ts'],
      exclude: ['lib/src/**/index.ts'],
    },
    testTimeout: 10000,
    fakeTimers: {
      shouldAdvanceTime: true,
    },
  },
});
