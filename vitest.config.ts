import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveSource = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/__tests__/**', '**/*.config.*', '**/index.ts'],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@dischargekit/types': resolveSource('./packages/types/src/index.ts'),
      '@dischargekit/core': resolveSource('./packages/core/src/index.ts'),
      '@dischargekit/domain': resolveSource('./packages/domain/src/index.ts'),
    },
  },
});
