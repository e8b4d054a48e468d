import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: './src/__tests__/setup.ts',
    testTimeout: 10000,
    hookTimeout: 15000,
    env: {
      NODE_ENV: 'test',
    },
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    alias: {
      '@taskpilot/shared': path.resolve(__dirname, '../packages/shared/src/index.ts'),
      '@': path.resolve(__dirname, './src'),
    },
  },
});
