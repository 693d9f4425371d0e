import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'workers/*/tests/**/*.test.ts']
  },
  resolve: {
    alias: {
      '@tracklab/core': path.resolve(__dirname, 'packages/tracklab-core/src'),
      '@tracklab/test-utils': path.resolve(__dirname, 'packages/tracklab-test-utils/src')
    }
  }
});
