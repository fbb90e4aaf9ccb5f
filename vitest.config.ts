import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages are consumed from their TypeScript sources in tests.
    conditions: ['source'],
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        statements: 85,
        lines: 85,
        functions: 85,
        branches: 77,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/index.ts',
        '**/*.config.ts',
        'packages/core/src/types.ts', // type-only module (no runtime statements)
      ],
    },
    testTimeout: 10000,
  },
});
