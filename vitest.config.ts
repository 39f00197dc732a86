import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Tests never reach the reasoning service
      '@anthropic-ai/sdk': fileURLToPath(new URL('./tests/mocks/anthropic.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
