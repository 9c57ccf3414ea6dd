import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 85,
        statements: 85,
      },
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/vitest.config.ts',
        '**/*.test.ts',
        '**/coverage/**',
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
      '@periorecord/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@periorecord/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@periorecord/domain': path.resolve(root, 'packages/domain/src/index.ts'),
      '@periorecord/infrastructure': path.resolve(root, 'packages/infrastructure/src/index.ts'),
    },
  },
});
