import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@vulntriage/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@vulntriage/engines': fileURLToPath(new URL('./packages/engines/src/index.ts', import.meta.url)),
      '@vulntriage/triage': fileURLToPath(new URL('./packages/triage/src/index.ts', import.meta.url)),
      '@vulntriage/pipeline': fileURLToPath(new URL('./packages/pipeline/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 20000,
  },
});
