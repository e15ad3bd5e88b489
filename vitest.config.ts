import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    watch: false,
    fileParallelism: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules'],
  },
  resolve: {
    alias: {
      'outbox-harness': fromRoot('./packages/core/src'),
      '@outbox-harness/vitest': fromRoot('./packages/vitest/src'),
    },
  },
});
