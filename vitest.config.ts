import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Keep tests independent from prebuilt package artifacts in clean checkouts.
      '@runwright/shared': packageEntry('shared'),
      '@runwright/db': packageEntry('db'),
      '@runwright/git': packageEntry('git'),
      '@runwright/agents': packageEntry('agents'),
      '@runwright/core': packageEntry('core'),
    },
  },
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/dist/**', '**/node_modules/**', '**/*.d.ts'],
    },
  },
});
