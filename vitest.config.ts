import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/__tests__/**',
        '**/__mocks__/**',
        '**/*.test.ts',
        '**/*.config.*',
        '**/index.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@casecontext/types': `${root}packages/types/src/index.ts`,
      '@casecontext/core': `${root}packages/core/src/index.ts`,
      '@casecontext/domain': `${root}packages/domain/src/index.ts`,
      '@casecontext/integrations': `${root}packages/integrations/src/index.ts`,
    },
  },
});
