import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

const rootDir = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['shared/tests/**/*.{test,spec}.ts', 'server/tests/**/*.{test,spec}.ts'],
    restoreMocks: true,
  },
  resolve: {
    alias: {
      '@shared': resolve(rootDir, 'shared'),
      '@server': resolve(rootDir, 'server/src'),
    },
  },
});
