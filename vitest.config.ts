import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/**/src/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@tabflow/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@tabflow/core': resolveFromRoot('packages/core/src/index.ts'),
      '@tabflow/operations': resolveFromRoot('packages/operations/src/index.ts'),
      '@tabflow/engine': resolveFromRoot('packages/engine/src/index.ts'),
      '@tabflow/io': resolveFromRoot('packages/io/src/index.ts'),
      '@tabflow/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
