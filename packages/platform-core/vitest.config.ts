import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolvePath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'platform-core',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'error',
    },
  },
  resolve: {
    alias: {
      '@healthmesh/platform-core': resolvePath('./src/index.ts'),
      '@healthmesh/test-utils': resolvePath('../shared/test-utils/src/index.ts'),
    },
  },
});
