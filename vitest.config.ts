import { defineConfig, mergeConfig } from 'vitest/config';
import { sharedVitestConfig } from './packages/vitest-config/src/index.js';

export default mergeConfig(
  sharedVitestConfig,
  defineConfig({
    test: {
      include: ['packages/*/src/**/*.test.ts'],
    },
  }),
);
