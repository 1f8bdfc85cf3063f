import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export const sharedVitestConfig = defineConfig({
  test: {
    globals: true,
    silent: true,
    env: {
      HTTP_CACHE_LOG_LEVEL: 'silent',
    },
    setupFiles: [fileURLToPath(new URL('./setup.ts', import.meta.url))],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/vitest-config/**',
        // Type-only contracts have no runtime to execute.
        'packages/core/src/types/**/*.ts',
        'packages/core/src/stores/cache-manager.ts',
      ],
    },
  },
});
