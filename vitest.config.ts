import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@imgtex\/core$/,
        replacement: path.resolve(__dirname, './packages/core/src/index.ts'),
      },
    ],
  },
  test: {
    root: __dirname,
    include: ['packages/**/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
