import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 30000,
    projects: ['packages/platform-core/vitest.config.ts', 'packages/services/*/vitest.config.ts'],
  },
});
