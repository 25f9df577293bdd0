import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // The package's runtime entry is its build; tests run against the sources
    alias: {
      '@competitive-intel/agents': fileURLToPath(new URL('./packages/agents/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
  },
});
