import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(rootDir, 'node/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['node/tests/**/*.test.ts'],
    env: { LOG_LEVEL: 'fatal', NODE_ENV: 'test' },
  },
});
