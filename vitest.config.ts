import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const src = (dir: string) => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],

    // Prevent resource leaks
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
      },
    },

    // Set reasonable timeouts
    testTimeout: 15000,
    hookTimeout: 10000,

    // Limit parallelism
    maxConcurrency: 5,
  },
  resolve: {
    alias: {
      '@agent': src('agent'),
      '@services': src('services'),
      '@tools': src('tools'),
      '@utils': src('utils'),
      '@config': src('config'),
      '@llm': src('llm'),
      '@mcp': src('mcp'),
      '@shared': src('types'),
    },
  },
});
