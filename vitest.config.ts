import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.workspaces/**', '**/.logs/**'],
  },
  resolve: {
    alias: {
      '@root': path.resolve(root, '.'),
      '@adapters': path.resolve(root, './adapters'),
      '@modules': path.resolve(root, './modules'),
      '@common': path.resolve(root, './common'),
    },
  },
});
