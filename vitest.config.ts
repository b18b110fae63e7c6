import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string => fileURLToPath(new URL(`./${name}/src/index.ts`, import.meta.url));

/**
 * Single configuration for every workspace package.
 * Unit tests are *.unit.test.ts, cross-package tests *.integration.test.ts.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@orcbatch/core': pkg('core'),
      '@orcbatch/config': pkg('config'),
      '@orcbatch/memory-engine': pkg('memory-engine'),
      '@orcbatch/writer': pkg('writer'),
      '@orcbatch/reader': pkg('reader'),
      '@orcbatch/test-utils': pkg('test-utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['*/src/__tests__/**/*.unit.test.ts', '*/src/__tests__/**/*.integration.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*/src/**/*.ts'],
      exclude: ['**/__tests__/**', 'test-utils/**'],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
