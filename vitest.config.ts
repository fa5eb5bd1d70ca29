import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    projects: ['packages/platform-core/vitest.config.ts', 'packages/services/*/vitest.config.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text-summary'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts', 'packages/services/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/__tests__/**', '**/main.ts', '**/index.ts'],
    },
  },
});
