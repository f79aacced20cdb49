import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

// Workspace packages export dist/ at run time; tests load their sources
const source = (dir: string): string => fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@switchyard/logging': source('packages/logging'),
      '@switchyard/errors': source('packages/errors'),
      '@switchyard/retry': source('packages/retry'),
      '@switchyard/http-client': source('packages/http-client'),
      '@switchyard/configuration': source('packages/configuration'),
      '@switchyard/gateway': source('gateway'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts', 'gateway/src/**/__tests__/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
