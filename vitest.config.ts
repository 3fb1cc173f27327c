import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

// __dirname is not defined under "type": "module"
const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['packages/**/__tests__/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // async tests that deadlock must not hang the run
    testTimeout: 10000,
    isolate: true,
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@monitoring': path.resolve(__dirname, 'packages/monitoring'),
    },
  },
});
