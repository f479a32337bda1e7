import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/*/tests/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    testTimeout: 10000,
    env: {
      NODE_ENV: 'test',
      // Keep test output readable; logger tests spy on winston directly
      LOG_CONSOLE: 'false',
    },
  },
  resolve: {
    alias: {
      '@wexport/core': resolveFromRoot('packages/core/src/index.ts'),
      '@wexport/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@wexport/export': resolveFromRoot('packages/export/src/index.ts'),
      '@wexport/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@wexport/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
