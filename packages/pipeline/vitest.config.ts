import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@predgrid/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'pipeline',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
