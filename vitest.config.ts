import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/*/src/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**', '**/node_modules/**'],
    globals: true,
    env: {
      NODE_ENV: 'test',
    },
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
