import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolve = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@uplang/core': resolve('./packages/core/src/index.ts'),
      '@uplang/parser': resolve('./packages/parser/up/src/index.ts'),
      '@uplang/generator-up': resolve('./packages/generator/up/src/index.ts'),
      '@uplang/generator-json': resolve('./packages/generator/json/src/index.ts'),
      '@uplang/watcher-chokidar': resolve('./packages/watcher/chokidar/src/index.ts'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
  },
});
