import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@depin-compat/shared': path.resolve(__dirname, 'packages/shared/src/index.ts'),
      '@depin-compat/client': path.resolve(__dirname, 'packages/client/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'services/*/test/**/*.test.ts'],
  },
});
