import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
  resolve: {
    alias: {
      '@tower-siege/shared': resolve(__dirname, 'packages/shared/src/index.ts'),
    },
  },
});
