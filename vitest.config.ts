import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@prepscout/agents': fromRoot('./agents/src'),
      '@prepscout/core': fromRoot('./packages/core/src'),
      '@prepscout/db': fromRoot('./packages/db/src'),
      '@prepscout/schemas': fromRoot('./packages/schemas/src'),
    },
  },
});
