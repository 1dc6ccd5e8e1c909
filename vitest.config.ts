import { defineConfig } from 'vitest/config';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    restoreMocks: true,

    // Prevent resource leaks
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        maxForks: 4,
      },
    },

    // Set reasonable timeouts
    testTimeout: 15000,
    hookTimeout: 10000,

    // Limit concurrent tests within a file
    maxConcurrency: 5,
  },
  resolve: {
    alias: {
      '@agent': resolve(root, './src/agent'),
      '@cli': resolve(root, './src/cli'),
      '@client': resolve(root, './src/client'),
      '@config': resolve(root, './src/config'),
      '@graph': resolve(root, './src/graph'),
      '@llm': resolve(root, './src/llm'),
      '@mcp': resolve(root, './src/mcp'),
      '@schema': resolve(root, './src/schema'),
      '@services': resolve(root, './src/services'),
      '@shared': resolve(root, './src/types'),
      '@tools': resolve(root, './src/tools'),
      '@tracing': resolve(root, './src/tracing'),
      '@utils': resolve(root, './src/utils'),
    },
  },
});
