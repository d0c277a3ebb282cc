import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'services/*/tests/**/*.test.ts'
    ],
    testTimeout: 30000
  },
  resolve: {
    alias: {
      '@timbre/core': path.resolve(rootDir, 'packages/timbre-core/src/index.ts'),
      '@timbre/test-utils': path.resolve(rootDir, 'packages/timbre-test-utils/src/index.ts')
    }
  }
});
