import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    // File store tests share the OS temp dir; keep files sequential
    fileParallelism: false,
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
