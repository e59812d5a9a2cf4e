import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@repo-infographic/server/infographic': fileURLToPath(new URL('./server/src/infographic/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['server/test/**/*.test.ts', 'web/test/**/*.test.ts'],
    environment: 'node',
  },
});
