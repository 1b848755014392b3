import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    include: ['tests/**/*.{test,spec}.ts'],
    environment: 'node',
    testTimeout: 20_000,
    env: {
      LOG_LEVEL: 'silent',
      MEME_WORKER_POOL_SIZE: '1',
    },
  },
});
