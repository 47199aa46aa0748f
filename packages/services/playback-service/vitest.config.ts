import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    name: 'playback-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@mixdeck/platform-core': fileURLToPath(new URL('../../platform-core/src', import.meta.url)),
      '@mixdeck/test-utils': fileURLToPath(new URL('../../shared/test-utils/src', import.meta.url)),
    },
  },
});
