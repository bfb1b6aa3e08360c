import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@tessera/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      '@tessera/engine': fileURLToPath(new URL('./packages/engine/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/*.test.ts', 'services/*/src/**/__tests__/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
    testTimeout: 10_000,
  },
});
